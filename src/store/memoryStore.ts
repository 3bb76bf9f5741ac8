/**
 * In-process lifecycle store. Records live in a Map for the life of the
 * process; reads return deep copies so callers can never mutate stored data.
 */
import { ResearchReport, ResearchStatus, StepName } from '../types/pipeline.js';
import { QueryLifecycleStore, QueryRecord, StepResult } from '../types/store.js';
import { NotFoundError, PipelineError, ValidationError } from '../types/errors.js';
import { canTransition } from '../core/state.js';

export class InMemoryQueryStore implements QueryLifecycleStore {
  private readonly records = new Map<string, QueryRecord>();

  async create(queryId: string, queryText: string): Promise<void> {
    if (this.records.has(queryId)) {
      throw new ValidationError({
        message: `Research query already exists: ${queryId}`,
        details: { queryId },
      });
    }

    const now = new Date();
    this.records.set(queryId, {
      queryId,
      queryText,
      status: 'pending',
      results: {},
      stepErrors: {},
      createdAt: now,
      updatedAt: now,
    });
  }

  async updateStatus(queryId: string, status: ResearchStatus): Promise<void> {
    const record = this.require(queryId);

    if (!canTransition(record.status, status)) {
      throw new PipelineError({
        message: `Cannot move query ${queryId} from "${record.status}" to "${status}"`,
        code: 'invalid_status_transition',
        details: { from: record.status, to: status },
      });
    }

    record.status = status;
    record.updatedAt = new Date();
  }

  async saveResult(queryId: string, result: StepResult): Promise<void> {
    const record = this.require(queryId);
    switch (result.step) {
      case 'web_search':
        record.results.web_search = structuredClone(result);
        break;
      case 'document_retrieval':
        record.results.document_retrieval = structuredClone(result);
        break;
      case 'analysis':
        record.results.analysis = structuredClone(result);
        break;
    }
    record.updatedAt = new Date();
  }

  async saveReport(queryId: string, report: ResearchReport): Promise<void> {
    const record = this.require(queryId);
    record.report = structuredClone(report);
    record.updatedAt = new Date();
  }

  async recordStepError(queryId: string, step: StepName, description: string): Promise<void> {
    const record = this.require(queryId);
    if (record.stepErrors[step] === undefined) {
      record.stepErrors[step] = description;
      record.updatedAt = new Date();
    }
  }

  async getStatus(queryId: string): Promise<ResearchStatus> {
    return this.require(queryId).status;
  }

  async getReport(queryId: string): Promise<ResearchReport | undefined> {
    const { report } = this.require(queryId);
    return report ? structuredClone(report) : undefined;
  }

  async getRecord(queryId: string): Promise<QueryRecord> {
    return structuredClone(this.require(queryId));
  }

  private require(queryId: string): QueryRecord {
    const record = this.records.get(queryId);
    if (!record) {
      throw new NotFoundError(queryId);
    }
    return record;
  }
}
