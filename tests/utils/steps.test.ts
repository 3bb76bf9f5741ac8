/**
 * Tests for the step creation utilities
 */
import { createStep } from '../../src/utils/steps';
import { BaseResearchError, PipelineError, ProviderError } from '../../src/types/errors';
import type { StepContext } from '../../src/types/pipeline';
import { createMockState, silenceConsole } from '../test-utils';

describe('createStep', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create a step with the given name', () => {
    const step = createStep('analysis', async () => ({ analysis: 'done' }), {});

    expect(step.name).toBe('analysis');
  });

  it('should merge the executor output into a new state', async () => {
    const initialState = createMockState();
    const step = createStep('analysis', async () => ({ analysis: 'done' }), {});

    const result = await step.execute(initialState);

    expect(result).not.toBe(initialState);
    expect(result.analysis).toBe('done');
    expect(initialState.analysis).toBe('');
  });

  it('should hand the options and context to the executor', async () => {
    const executor = jest.fn(async () => ({ analysis: 'done' }));
    const options = { temperature: 0.2 };
    const context: StepContext = { abortSignal: new AbortController().signal };

    await createStep('analysis', executor, options).execute(createMockState(), context);

    expect(executor).toHaveBeenCalledWith(
      expect.objectContaining({ queryText: 'What is quantum entanglement?' }),
      options,
      expect.objectContaining({ context })
    );
  });

  it('should wrap non-ResearchError in BaseResearchError', async () => {
    const step = createStep(
      'analysis',
      async () => {
        throw new Error('plain error');
      },
      {}
    );

    const execution = step.execute(createMockState());

    await expect(execution).rejects.toBeInstanceOf(BaseResearchError);
    await expect(execution).rejects.toMatchObject({
      code: 'step_execution_error',
      step: 'analysis',
      message: 'plain error',
    });
  });

  it('should pass through ResearchError and attribute it to the step', async () => {
    const researchError = new ProviderError({ message: 'network failure', provider: 'fake-search' });
    const step = createStep(
      'web_search',
      async () => {
        throw researchError;
      },
      {}
    );

    await expect(step.execute(createMockState())).rejects.toBe(researchError);
    expect(researchError.step).toBe('web_search');
  });

  it('should refuse to run twice on the same state', async () => {
    const step = createStep('analysis', async () => ({ analysis: 'done' }), {});
    const state = await step.execute(createMockState());
    const withHistory = {
      ...state,
      metadata: {
        ...state.metadata,
        stepHistory: [
          { stepName: 'analysis' as const, startTime: new Date(), endTime: new Date(), success: true, metadata: { duration: 0 } },
        ],
      },
    };

    await expect(step.execute(withHistory)).rejects.toBeInstanceOf(PipelineError);
  });
});
