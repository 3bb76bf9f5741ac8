import { createDefaultSteps, createInitialState, executePipeline } from '../../src/core/pipeline';
import type { ResearchStep } from '../../src/types/pipeline';
import {
  createFakeIndex,
  createFakeLlm,
  createFakeSearch,
  hangUntilAborted,
  sampleDocuments,
  sampleSearchResults,
  silenceConsole,
} from '../test-utils';

describe('executePipeline', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run the four steps in order and produce a report', async () => {
    const search = createFakeSearch();
    const index = createFakeIndex();
    const llm = createFakeLlm();
    const initialState = createInitialState('What is quantum entanglement?', 'q-1');

    const finalState = await executePipeline(initialState, createDefaultSteps({ search, index, llm }));

    expect(finalState.stepErrors).toEqual({});
    expect(finalState.metadata.stepHistory.map((record) => record.stepName)).toEqual([
      'web_search',
      'document_retrieval',
      'analysis',
      'report_writing',
    ]);
    expect(finalState.metadata.stepHistory.every((record) => record.success)).toBe(true);
    expect(finalState.searchResults).toEqual(sampleSearchResults);
    expect(finalState.retrievedDocuments).toEqual(sampleDocuments);
    expect(finalState.analysis).toBe('Sources agree that entanglement is real.');
    expect(finalState.report?.title).toBe('Research Report: What is quantum entanglement?');
    expect(finalState.report?.metadata.degradedSteps).toEqual([]);
    expect(llm.complete.mock.calls.map(([, context]) => context.step)).toEqual(['analysis', 'report_writing']);
  });

  it('should leave the initial state untouched', async () => {
    const initialState = createInitialState('What is quantum entanglement?', 'q-1');

    await executePipeline(
      initialState,
      createDefaultSteps({ search: createFakeSearch(), index: createFakeIndex(), llm: createFakeLlm() })
    );

    expect(initialState.searchResults).toEqual([]);
    expect(initialState.report).toBeUndefined();
    expect(initialState.metadata.stepHistory).toEqual([]);
  });

  it('should continue with degraded input when web search fails', async () => {
    const search = createFakeSearch();
    search.search.mockRejectedValue(new Error('quota exceeded'));
    const llm = createFakeLlm();

    const finalState = await executePipeline(
      createInitialState('What is quantum entanglement?', 'q-1'),
      createDefaultSteps({ search, index: createFakeIndex(), llm })
    );

    expect(finalState.stepErrors).toEqual({ web_search: 'Web search failed: quota exceeded' });
    expect(finalState.searchResults).toEqual([]);
    expect(finalState.retrievedDocuments).toEqual(sampleDocuments);
    expect(finalState.report?.metadata.degradedSteps).toEqual(['web_search']);
    expect(finalState.report?.metadata.webResultsCount).toBe(0);
    expect(finalState.metadata.stepHistory[0]).toMatchObject({
      stepName: 'web_search',
      success: false,
      error: 'Web search failed: quota exceeded',
    });
  });

  it('should record a timed-out step and abort its signal', async () => {
    const search = createFakeSearch();
    let receivedSignal: AbortSignal | undefined;
    search.search.mockImplementation((_query, options) => {
      receivedSignal = options?.abortSignal;
      return hangUntilAborted(options?.abortSignal);
    });

    const finalState = await executePipeline(
      createInitialState('What is quantum entanglement?', 'q-1'),
      createDefaultSteps({ search, index: createFakeIndex(), llm: createFakeLlm() }),
      { stepTimeout: 20 }
    );

    expect(finalState.stepErrors.web_search).toBe('Step "web_search" timed out after 20ms');
    expect(finalState.metadata.stepHistory[0].metadata.timedOut).toBe(true);
    expect(receivedSignal?.aborted).toBe(true);
    expect(finalState.report).toBeDefined();
  });

  it("should skip the remaining steps under errorHandling 'stop'", async () => {
    const search = createFakeSearch();
    search.search.mockRejectedValue(new Error('quota exceeded'));
    const index = createFakeIndex();
    const llm = createFakeLlm();

    const finalState = await executePipeline(
      createInitialState('What is quantum entanglement?', 'q-1'),
      createDefaultSteps({ search, index, llm }),
      { errorHandling: 'stop' }
    );

    expect(index.query).not.toHaveBeenCalled();
    expect(llm.complete).not.toHaveBeenCalled();
    expect(finalState.report).toBeUndefined();
    expect(finalState.metadata.stepHistory.slice(1).map((record) => record.metadata.skipped)).toEqual([
      true,
      true,
      true,
    ]);
  });

  it('should turn a step that writes foreign state into a step error', async () => {
    const rogueStep: ResearchStep = {
      name: 'web_search',
      execute: async (state) => ({ ...state, analysis: 'written by the wrong step' }),
    };

    const finalState = await executePipeline(createInitialState('q', 'q-1'), [rogueStep]);

    expect(finalState.analysis).toBe('');
    expect(finalState.stepErrors.web_search).toBe('Step "web_search" modified state it does not own: analysis');
  });
});
