import { retrieveDocuments } from '../../src/steps/retrieveDocuments';
import { ProviderError } from '../../src/types/errors';
import { createFakeIndex, createMockState, sampleDocuments, silenceConsole } from '../test-utils';

describe('retrieveDocuments step', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should query the index with the question and default topK', async () => {
    const index = createFakeIndex();
    const updatedState = await retrieveDocuments({ index }).execute(createMockState());

    expect(index.query).toHaveBeenCalledWith('What is quantum entanglement?', 5, { abortSignal: undefined });
    expect(updatedState.retrievedDocuments).toEqual(sampleDocuments);
  });

  it('should keep at most topK documents in index order', async () => {
    const index = createFakeIndex([
      { content: 'one', metadata: {} },
      { content: 'two', metadata: {} },
      { content: 'three', metadata: {} },
    ]);

    const updatedState = await retrieveDocuments({ index, topK: 2 }).execute(createMockState());

    expect(updatedState.retrievedDocuments.map((document) => document.content)).toEqual(['one', 'two']);
  });

  it('should succeed with an empty index', async () => {
    const updatedState = await retrieveDocuments({ index: createFakeIndex([]) }).execute(createMockState());

    expect(updatedState.retrievedDocuments).toEqual([]);
  });

  it('should wrap index failures in a ProviderError', async () => {
    const index = createFakeIndex();
    index.query.mockRejectedValue(new Error('index offline'));

    const execution = retrieveDocuments({ index }).execute(createMockState());

    await expect(execution).rejects.toBeInstanceOf(ProviderError);
    await expect(execution).rejects.toMatchObject({
      message: 'Document retrieval failed: index offline',
      step: 'document_retrieval',
    });
  });
});
