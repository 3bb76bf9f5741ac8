/**
 * Utilities for creating pipeline steps
 */
import {
  ResearchState,
  ResearchStep,
  StepContext,
  StepName,
  StepOutputs,
} from '../types/pipeline.js';
import { toResearchError } from '../types/errors.js';
import { extendState } from '../core/state.js';
import { createStepLogger, Logger } from './logging.js';

/**
 * Signature of the function doing a step's actual work. It returns only the
 * fields the step owns; {@link createStep} merges them into the state.
 */
export type StepExecutor<N extends StepName, T> = (
  state: ResearchState,
  options: T,
  helpers: { context: StepContext; logger: Logger }
) => Promise<StepOutputs[N]>;

/**
 * Creates a new step with consistent structure and error handling
 *
 * The returned step logs its start and duration, extends the state with the
 * executor's output, and rethrows failures as research errors attributed to
 * the step. It never retries.
 *
 * @param name Name of the step
 * @param executor Function that executes the step logic
 * @param options Step options
 * @returns A research step with standardized error handling
 */
export function createStep<N extends StepName, T extends object>(
  name: N,
  executor: StepExecutor<N, T>,
  options: T
): ResearchStep {
  const step: ResearchStep = {
    name,
    async execute(state: ResearchState, context: StepContext = {}): Promise<ResearchState> {
      const stepLogger = createStepLogger(name, state.queryId);
      const startTime = Date.now();
      stepLogger.info('Starting execution');

      try {
        const output = await executor(state, options, { context, logger: stepLogger });
        const result = extendState(state, name, output);

        const duration = Date.now() - startTime;
        stepLogger.info(`Execution completed successfully in ${duration}ms`);

        return result;
      } catch (error: unknown) {
        const researchError = toResearchError(error, name);
        if (!researchError.step) {
          researchError.step = name;
        }

        const duration = Date.now() - startTime;
        stepLogger.error(`Execution failed in ${duration}ms: ${researchError.getFormattedMessage()}`);

        throw researchError;
      }
    },
  };

  return step;
}
