/**
 * Persistence contract for query status, intermediate results and reports
 */
import type {
  ResearchReport,
  ResearchStatus,
  RetrievedDocument,
  SearchResult,
  StepName,
} from './pipeline.js';

/**
 * An intermediate result, tagged with the step that produced it
 */
export type StepResult =
  | { step: 'web_search'; searchResults: SearchResult[] }
  | { step: 'document_retrieval'; retrievedDocuments: RetrievedDocument[] }
  | { step: 'analysis'; analysis: string };

export type StepResultName = StepResult['step'];

/**
 * Everything persisted about one query
 */
export interface QueryRecord {
  queryId: string;
  queryText: string;
  status: ResearchStatus;
  results: { [K in StepResultName]?: Extract<StepResult, { step: K }> };
  stepErrors: Partial<Record<StepName, string>>;
  report?: ResearchReport;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * All operations fail with NotFoundError for an unknown `queryId`.
 */
export interface QueryLifecycleStore {
  create(queryId: string, queryText: string): Promise<void>;
  /** Rejects transitions that leave a terminal status or move backwards */
  updateStatus(queryId: string, status: ResearchStatus): Promise<void>;
  saveResult(queryId: string, result: StepResult): Promise<void>;
  saveReport(queryId: string, report: ResearchReport): Promise<void>;
  recordStepError(queryId: string, step: StepName, description: string): Promise<void>;
  getStatus(queryId: string): Promise<ResearchStatus>;
  /** Resolves to undefined while no report has been saved */
  getReport(queryId: string): Promise<ResearchReport | undefined>;
  getRecord(queryId: string): Promise<QueryRecord>;
}
