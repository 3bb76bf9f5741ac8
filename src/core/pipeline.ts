/**
 * Core pipeline execution engine
 *
 * This module runs the research steps strictly in order over one query's
 * state. A failed or timed-out step is recorded in `stepErrors` and the
 * pipeline moves on with that step's fields left at their defaults, so a
 * failed search never prevents the writer from producing a best-effort report.
 *
 * @module core/pipeline
 */

import {
  ErrorHandlingMode,
  PipelineConfig,
  ResearchState,
  ResearchStep,
  StepExecutionRecord,
} from '../types/pipeline.js';
import { LanguageModelClient, VectorIndex, WebSearchProvider } from '../types/providers.js';
import { isTimeoutError, toResearchError } from '../types/errors.js';
import { logger as rootLogger } from '../utils/logging.js';
import { withTimeout } from '../utils/timeout.js';
import { assertAppendOnly, recordStepExecution, recordStepFailure } from './state.js';
import { searchWeb } from '../steps/searchWeb.js';
import { retrieveDocuments } from '../steps/retrieveDocuments.js';
import { analyze } from '../steps/analyze.js';
import { writeReport } from '../steps/writeReport.js';

export { createInitialState } from './state.js';

/**
 * Default pipeline configuration
 */
const DEFAULT_PIPELINE_CONFIG: Required<Omit<PipelineConfig, 'steps'>> = {
  errorHandling: 'continue',
  stepTimeout: 60000, // 1 minute
};

/**
 * Collaborators needed by the default steps
 */
export interface PipelineCollaborators {
  search: WebSearchProvider;
  index: VectorIndex;
  llm: LanguageModelClient;
}

export interface DefaultStepOptions {
  maxSearchResults?: number;
  topK?: number;
}

/**
 * Returns the fixed step sequence: web search, document retrieval, analysis,
 * report writing
 */
export function createDefaultSteps(
  { search, index, llm }: PipelineCollaborators,
  options: DefaultStepOptions = {}
): ResearchStep[] {
  return [
    searchWeb({ provider: search, maxResults: options.maxSearchResults }),
    retrieveDocuments({ index, topK: options.topK }),
    analyze({ llm }),
    writeReport({ llm }),
  ];
}

/**
 * Executes a single step, turning any failure into a recorded step error
 */
async function executeStepWithErrorHandling(
  step: ResearchStep,
  state: ResearchState,
  stepTimeout: number
): Promise<{ state: ResearchState; success: boolean }> {
  const stepLogger = rootLogger.child({ queryId: state.queryId, step: step.name });
  const startTime = new Date();

  try {
    const updatedState = await withTimeout(
      (abortSignal) => step.execute(state, { abortSignal }),
      stepTimeout,
      step.name
    );
    assertAppendOnly(state, updatedState, step.name);

    const endTime = new Date();
    return {
      state: recordStepExecution(updatedState, {
        stepName: step.name,
        startTime,
        endTime,
        success: true,
        metadata: { duration: endTime.getTime() - startTime.getTime() },
      }),
      success: true,
    };
  } catch (error: unknown) {
    const researchError = toResearchError(error, step.name);
    const endTime = new Date();
    const duration = endTime.getTime() - startTime.getTime();

    stepLogger.warn(`Step failed after ${duration}ms, continuing with degraded input: ${researchError.message}`);

    const record: StepExecutionRecord = {
      stepName: step.name,
      startTime,
      endTime,
      success: false,
      error: researchError.message,
      metadata: { duration, ...(isTimeoutError(researchError) ? { timedOut: true } : {}) },
    };

    return {
      state: recordStepExecution(recordStepFailure(state, step.name, researchError.message), record),
      success: false,
    };
  }
}

function recordSkippedStep(state: ResearchState, step: ResearchStep): ResearchState {
  const now = new Date();
  return recordStepExecution(state, {
    stepName: step.name,
    startTime: now,
    endTime: now,
    success: false,
    metadata: { duration: 0, skipped: true },
  });
}

/**
 * Main pipeline execution function
 *
 * Runs `steps` in order and returns the final state; never rejects because of
 * a step failure.
 *
 * @example
 * ```typescript
 * const finalState = await executePipeline(
 *   createInitialState('What is quantum entanglement?'),
 *   createDefaultSteps({ search, index, llm }),
 *   { stepTimeout: 30000 }
 * );
 * finalState.stepErrors; // e.g. { web_search: 'Web search failed: quota exceeded' }
 * ```
 */
export async function executePipeline(
  initialState: ResearchState,
  steps: ResearchStep[],
  config: Partial<PipelineConfig> = {}
): Promise<ResearchState> {
  const errorHandling: ErrorHandlingMode = config.errorHandling ?? DEFAULT_PIPELINE_CONFIG.errorHandling;
  const stepTimeout = config.stepTimeout ?? DEFAULT_PIPELINE_CONFIG.stepTimeout;
  const pipelineLogger = rootLogger.child({ queryId: initialState.queryId });

  pipelineLogger.info(`Starting pipeline execution with ${steps.length} steps`);
  const startTime = Date.now();

  let state = initialState;
  let stopped = false;

  for (const step of steps) {
    if (stopped) {
      pipelineLogger.debug(`Skipping step "${step.name}" (errorHandling: 'stop')`);
      state = recordSkippedStep(state, step);
      continue;
    }

    const outcome = await executeStepWithErrorHandling(step, state, stepTimeout);
    state = outcome.state;

    if (!outcome.success && errorHandling === 'stop') {
      pipelineLogger.info(`Stopping pipeline execution due to error in step "${step.name}" (errorHandling: 'stop')`);
      stopped = true;
    }
  }

  const failedSteps = Object.keys(state.stepErrors).length;
  pipelineLogger.info(
    `Pipeline execution finished in ${Date.now() - startTime}ms` +
      (failedSteps > 0 ? ` with ${failedSteps} failed step(s)` : '')
  );

  return state;
}
