/**
 * Query lifecycle around the research pipeline
 *
 * The orchestrator accepts queries, runs each one through the fixed step
 * sequence as a background task, persists every transition to the lifecycle
 * store, and lets callers poll for status and fetch the report.
 *
 * @module core/orchestrator
 */
import { v4 as uuidv4 } from 'uuid';
import {
  ErrorHandlingMode,
  ResearchReport,
  ResearchState,
  ResearchStatus,
  ResearchStep,
  STEP_SEQUENCE,
} from '../types/pipeline.js';
import { QueryLifecycleStore, QueryRecord } from '../types/store.js';
import { NotReadyError, PipelineError, ValidationError, describeError } from '../types/errors.js';
import { LogLevel, logger as rootLogger } from '../utils/logging.js';
import { InMemoryQueryStore } from '../store/memoryStore.js';
import { createDefaultSteps, executePipeline, PipelineCollaborators } from './pipeline.js';
import { createInitialState, transitionStatus } from './state.js';

/**
 * Options for the research orchestrator
 */
export interface OrchestratorOptions extends PipelineCollaborators {
  /** Lifecycle store; defaults to an in-memory store */
  store?: QueryLifecycleStore;
  /** Maximum execution time of a single step in milliseconds */
  stepTimeout?: number;
  /** Web search results kept per query */
  maxSearchResults?: number;
  /** Documents retrieved per query */
  topK?: number;
  /** Defaults to 'continue' (degraded continuation) */
  errorHandling?: ErrorHandlingMode;
  /** Minimum log level to display */
  logLevel?: LogLevel;
}

/**
 * Coordinates research queries from submission to report
 *
 * @example
 * ```typescript
 * const orchestrator = new ResearchOrchestrator({ search, index, llm });
 *
 * const queryId = await orchestrator.submit('What is quantum entanglement?');
 * await orchestrator.getStatus(queryId); // 'pending' | 'running' | ...
 *
 * await orchestrator.waitFor(queryId);
 * const report = await orchestrator.getReport(queryId);
 * ```
 */
export class ResearchOrchestrator {
  readonly store: QueryLifecycleStore;
  private readonly steps: readonly ResearchStep[];
  private readonly options: OrchestratorOptions;
  private readonly tasks = new Map<string, Promise<ResearchState>>();

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.store = options.store ?? new InMemoryQueryStore();
    this.steps = createDefaultSteps(options, {
      maxSearchResults: options.maxSearchResults,
      topK: options.topK,
    });

    if (options.logLevel) {
      rootLogger.setLogLevel(options.logLevel);
    }
  }

  /**
   * Accepts a research question and schedules its pipeline.
   *
   * The query is persisted as `pending` before this resolves; execution starts
   * on a later turn of the event loop. Submitting the same text twice yields
   * two independent queries.
   *
   * @returns the new query's identifier
   * @throws {ValidationError} when the question is empty
   */
  async submit(queryText: string): Promise<string> {
    if (typeof queryText !== 'string' || !queryText.trim()) {
      throw new ValidationError({
        message: 'Research query must be a non-empty string',
        details: { queryText },
        suggestions: ["Example: orchestrator.submit('What is quantum entanglement?')"],
      });
    }

    const queryId = uuidv4();
    const initialState = createInitialState(queryText.trim(), queryId);
    await this.store.create(queryId, initialState.queryText);

    const task = new Promise<void>((resolve) => setImmediate(() => resolve()))
      .then(() => this.run(queryId, initialState))
      .finally(() => this.tasks.delete(queryId));
    this.tasks.set(queryId, task);

    rootLogger.child({ queryId }).info(`Submitted research query: "${initialState.queryText}"`);
    return queryId;
  }

  /**
   * Runs the pipeline for a submitted query and drives it to a terminal
   * status. Never rejects: any failure ends in `failed`.
   */
  async run(queryId: string, initialState: ResearchState): Promise<ResearchState> {
    const queryLogger = rootLogger.child({ queryId });
    let state = initialState;

    try {
      state = transitionStatus(state, 'running');
      await this.store.updateStatus(queryId, 'running');

      state = await executePipeline(state, [...this.steps], {
        stepTimeout: this.options.stepTimeout,
        errorHandling: this.options.errorHandling,
      });

      await this.persistProgress(state);

      const terminal: ResearchStatus = state.report ? 'completed' : 'failed';
      if (state.report) {
        await this.store.saveReport(queryId, state.report);
      }

      // Terminal status goes last so pollers that see it also see everything above
      await this.store.updateStatus(queryId, terminal);
      state = transitionStatus(state, terminal);

      const failed = Object.keys(state.stepErrors);
      queryLogger.info(
        `Research ${state.status}` + (failed.length > 0 ? ` (step errors: ${failed.join(', ')})` : '')
      );
      return state;
    } catch (error: unknown) {
      queryLogger.error(`Research run aborted: ${describeError(error)}`);
      return this.markFailed(state, error);
    }
  }

  /**
   * @throws {NotFoundError} for an unknown identifier
   */
  async getStatus(queryId: string): Promise<ResearchStatus> {
    return this.store.getStatus(queryId);
  }

  /**
   * @throws {NotFoundError} for an unknown identifier
   * @throws {NotReadyError} unless the query completed
   */
  async getReport(queryId: string): Promise<ResearchReport> {
    const status = await this.store.getStatus(queryId);
    if (status !== 'completed') {
      throw new NotReadyError(queryId, status);
    }

    const report = await this.store.getReport(queryId);
    if (!report) {
      throw new PipelineError({
        message: `Query ${queryId} is completed but has no stored report`,
        code: 'invariant_violation',
      });
    }
    return report;
  }

  /**
   * Everything persisted for a query: status, intermediate results, step
   * errors and report
   *
   * @throws {NotFoundError} for an unknown identifier
   */
  async getResult(queryId: string): Promise<QueryRecord> {
    return this.store.getRecord(queryId);
  }

  /**
   * Resolves once the query's pipeline task has finished. Resolves at once for
   * queries that are not in flight in this process.
   */
  async waitFor(queryId: string): Promise<void> {
    await this.tasks.get(queryId);
  }

  /**
   * Resolves once every in-flight pipeline has finished
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks.values()]);
    }
  }

  /**
   * Submits a query and waits for its report
   *
   * @throws {NotReadyError} with status `failed` when no report was produced
   */
  async executeFull(queryText: string): Promise<ResearchReport> {
    const queryId = await this.submit(queryText);
    await this.waitFor(queryId);
    return this.getReport(queryId);
  }

  /**
   * Adds documents to the vector index used by document retrieval
   *
   * @returns the new documents' ids, in input order
   * @throws {ValidationError} when `texts` and `metadatas` differ in length
   */
  async indexDocuments(texts: string[], metadatas?: Record<string, unknown>[]): Promise<string[]> {
    const resolvedMetadatas = metadatas ?? texts.map(() => ({}));

    if (resolvedMetadatas.length !== texts.length) {
      throw new ValidationError({
        message: `Got ${texts.length} texts but ${resolvedMetadatas.length} metadata entries`,
        details: { texts: texts.length, metadatas: resolvedMetadatas.length },
        suggestions: ['Provide exactly one metadata object per text'],
      });
    }

    if (texts.length === 0) {
      return [];
    }

    const ids = await this.options.index.index(texts, resolvedMetadatas);
    rootLogger.info(`Indexed ${ids.length} documents`);
    return ids;
  }

  /**
   * Persists intermediate results (even when empty) and step errors
   */
  private async persistProgress(state: ResearchState): Promise<void> {
    const { queryId } = state;

    await this.store.saveResult(queryId, { step: 'web_search', searchResults: [...state.searchResults] });
    await this.store.saveResult(queryId, {
      step: 'document_retrieval',
      retrievedDocuments: [...state.retrievedDocuments],
    });
    await this.store.saveResult(queryId, { step: 'analysis', analysis: state.analysis });

    for (const step of STEP_SEQUENCE) {
      const description = state.stepErrors[step];
      if (description !== undefined) {
        await this.store.recordStepError(queryId, step, description);
      }
    }
  }

  /**
   * Best-effort move to `failed` after an unexpected error in `run`
   */
  private async markFailed(state: ResearchState, cause: unknown): Promise<ResearchState> {
    let failedState = state;
    if (failedState.status === 'pending') failedState = transitionStatus(failedState, 'running');
    if (failedState.status === 'running') failedState = transitionStatus(failedState, 'failed');

    try {
      const stored = await this.store.getStatus(state.queryId);
      if (stored === 'pending') {
        await this.store.updateStatus(state.queryId, 'running');
      }
      if (stored === 'pending' || stored === 'running') {
        await this.store.updateStatus(state.queryId, 'failed');
      }
    } catch (error: unknown) {
      rootLogger
        .child({ queryId: state.queryId })
        .error(`Could not record failure (cause: ${describeError(cause)}): ${describeError(error)}`);
    }

    return failedState;
  }
}
