/**
 * Types for the research state and pipeline steps
 */

/**
 * Names of the four pipeline steps, in execution order
 */
export const STEP_SEQUENCE = [
  'web_search',
  'document_retrieval',
  'analysis',
  'report_writing',
] as const;

export type StepName = (typeof STEP_SEQUENCE)[number];

/**
 * Lifecycle status of a research query
 */
export type ResearchStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Represents a search result from web search
 */
export interface SearchResult {
  title: string;
  snippet: string;
  sourceUrl: string;
}

/**
 * Represents a document returned by the vector index
 */
export interface RetrievedDocument {
  content: string;
  metadata: Record<string, unknown>;
  /** Similarity score reported by the index, when it has one */
  score?: number;
}

export interface ReportMetadata {
  query: string;
  /** ISO timestamp of report generation */
  generatedAt: string;
  webResultsCount: number;
  documentCount: number;
  /** Steps that had already failed when the report was written */
  degradedSteps: StepName[];
  [key: string]: unknown;
}

/**
 * Final structured output of the report writing step
 */
export interface ResearchReport {
  title: string;
  content: string;
  summary: string;
  metadata: ReportMetadata;
}

/**
 * Records the execution of a step in the pipeline
 */
export interface StepExecutionRecord {
  stepName: StepName;
  startTime: Date;
  endTime: Date;
  success: boolean;
  /** Description of the failure, when the step failed */
  error?: string;
  metadata: {
    /** Duration of step execution in milliseconds */
    duration: number;
    /** Whether the step was cut short by the step timeout */
    timedOut?: boolean;
    /** Whether the step was skipped because an earlier step stopped the pipeline */
    skipped?: boolean;
  };
}

/**
 * The single value threaded through the pipeline for one query.
 *
 * Each step fills in only its own fields (see {@link StepOutputs}); the
 * orchestrator owns `stepErrors`, `status` and `metadata`.
 */
export interface ResearchState {
  readonly queryId: string;
  readonly queryText: string;
  readonly searchResults: readonly SearchResult[];
  readonly retrievedDocuments: readonly RetrievedDocument[];
  readonly analysis: string;
  readonly report?: ResearchReport;
  readonly stepErrors: Readonly<Partial<Record<StepName, string>>>;
  readonly status: ResearchStatus;
  readonly metadata: {
    readonly createdAt: Date;
    readonly startedAt?: Date;
    readonly finishedAt?: Date;
    readonly stepHistory: readonly StepExecutionRecord[];
  };
}

/**
 * The fields each step is allowed to write
 */
export interface StepOutputs {
  web_search: { searchResults: readonly SearchResult[] };
  document_retrieval: { retrievedDocuments: readonly RetrievedDocument[] };
  analysis: { analysis: string };
  report_writing: { report: ResearchReport };
}

/**
 * Runtime values passed to a step by the pipeline
 */
export interface StepContext {
  /** Fires when the step exceeds its time budget */
  abortSignal?: AbortSignal;
}

/**
 * Represents a pipeline step
 */
export interface ResearchStep {
  name: StepName;
  execute: (state: ResearchState, context?: StepContext) => Promise<ResearchState>;
}

/**
 * How the pipeline reacts to a failed step
 *
 * - `continue`: record the error and run the remaining steps on degraded input
 * - `stop`: record the error and skip the remaining steps
 */
export type ErrorHandlingMode = 'continue' | 'stop';

/**
 * Configuration for the research pipeline
 */
export interface PipelineConfig {
  steps: ResearchStep[];
  /** How to handle errors in the pipeline */
  errorHandling?: ErrorHandlingMode;
  /** Maximum execution time of a single step in milliseconds */
  stepTimeout?: number;
}
