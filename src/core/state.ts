/**
 * Construction and transitions of the research state
 *
 * Every function here returns a new state object; the input is never mutated.
 * Steps may only add their own fields (see {@link extendState}), and the status
 * only moves forward (see {@link transitionStatus}).
 *
 * @module core/state
 */
import { v4 as uuidv4 } from 'uuid';
import {
  ResearchState,
  ResearchStatus,
  StepExecutionRecord,
  StepName,
  StepOutputs,
} from '../types/pipeline.js';
import { PipelineError } from '../types/errors.js';

/**
 * The state fields owned by each step
 */
export const STEP_FIELDS: { [N in StepName]: ReadonlyArray<keyof StepOutputs[N]> } = {
  web_search: ['searchResults'],
  document_retrieval: ['retrievedDocuments'],
  analysis: ['analysis'],
  report_writing: ['report'],
};

const STEP_OWNED_FIELDS = ['searchResults', 'retrievedDocuments', 'analysis', 'report'] as const;

const ALLOWED_TRANSITIONS: Record<ResearchStatus, readonly ResearchStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Creates the initial state object for a research query
 *
 * @example
 * ```typescript
 * const state = createInitialState('What is quantum entanglement?');
 * state.status; // 'pending'
 * ```
 */
export function createInitialState(queryText: string, queryId: string = uuidv4()): ResearchState {
  return {
    queryId,
    queryText,
    searchResults: [],
    retrievedDocuments: [],
    analysis: '',
    report: undefined,
    stepErrors: {},
    status: 'pending',
    metadata: {
      createdAt: new Date(),
      stepHistory: [],
    },
  };
}

/**
 * Returns a new state with the fields of `step` filled in.
 *
 * @throws {PipelineError} when the patch carries a field the step does not own,
 * or when the step already ran for this state
 */
export function extendState<N extends StepName>(
  state: ResearchState,
  step: N,
  patch: StepOutputs[N]
): ResearchState {
  const allowed: readonly PropertyKey[] = STEP_FIELDS[step];
  const foreign = Object.keys(patch).filter((key) => !allowed.includes(key));

  if (foreign.length > 0) {
    throw new PipelineError({
      message: `Step "${step}" cannot write ${foreign.map((key) => `"${key}"`).join(', ')}`,
      code: 'invariant_violation',
      step,
      details: { allowed, foreign },
    });
  }

  if (state.metadata.stepHistory.some((record) => record.stepName === step)) {
    throw new PipelineError({
      message: `Step "${step}" already ran for query ${state.queryId}`,
      code: 'invariant_violation',
      step,
    });
  }

  return { ...state, ...patch };
}

/**
 * Verifies that `after` differs from `before` only in the fields owned by `step`
 * (plus step bookkeeping, which steps never touch).
 *
 * @throws {PipelineError} naming the fields that changed
 */
export function assertAppendOnly(before: ResearchState, after: ResearchState, step: StepName): void {
  const own: readonly string[] = STEP_FIELDS[step];
  const changed: string[] = [];

  for (const field of STEP_OWNED_FIELDS) {
    if (!own.includes(field) && before[field] !== after[field]) {
      changed.push(field);
    }
  }

  if (before.queryId !== after.queryId) changed.push('queryId');
  if (before.queryText !== after.queryText) changed.push('queryText');
  if (before.status !== after.status) changed.push('status');
  if (before.stepErrors !== after.stepErrors) changed.push('stepErrors');
  if (before.metadata !== after.metadata) changed.push('metadata');

  if (changed.length > 0) {
    throw new PipelineError({
      message: `Step "${step}" modified state it does not own: ${changed.join(', ')}`,
      code: 'invariant_violation',
      step,
      details: { changed },
    });
  }
}

/**
 * Returns a new state with the failure of `step` recorded. An existing entry
 * is never overwritten.
 */
export function recordStepFailure(state: ResearchState, step: StepName, description: string): ResearchState {
  if (state.stepErrors[step] !== undefined) {
    return state;
  }

  return {
    ...state,
    stepErrors: { ...state.stepErrors, [step]: description },
  };
}

/**
 * Appends a step execution record to the state's history
 */
export function recordStepExecution(state: ResearchState, record: StepExecutionRecord): ResearchState {
  return {
    ...state,
    metadata: {
      ...state.metadata,
      stepHistory: [...state.metadata.stepHistory, record],
    },
  };
}

export function isTerminalStatus(status: ResearchStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: ResearchStatus, to: ResearchStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Returns a new state with the status advanced to `next`.
 *
 * @throws {PipelineError} with code `invalid_status_transition` for any move
 * other than pending → running → completed | failed
 */
export function transitionStatus(state: ResearchState, next: ResearchStatus): ResearchState {
  if (!canTransition(state.status, next)) {
    throw new PipelineError({
      message: `Cannot move query ${state.queryId} from "${state.status}" to "${next}"`,
      code: 'invalid_status_transition',
      details: { from: state.status, to: next },
    });
  }

  const now = new Date();
  return {
    ...state,
    status: next,
    metadata: {
      ...state.metadata,
      ...(next === 'running' ? { startedAt: now } : { finishedAt: now }),
    },
  };
}
