import { ErrorCode } from './errorCodes.js';
import type { ResearchStatus } from './pipeline.js';

/**
 * Base Research Error interface implemented by all specialized error classes
 */
export interface ResearchError extends Error {
  /** Error code identifying the specific type of error */
  code: ErrorCode;
  /** The pipeline step where the error occurred */
  step?: string;
  /** Additional details about the error for debugging */
  details?: Record<string, unknown>;
  /** Suggestions for fixing or working around the error */
  suggestions?: string[];
}

type ErrorOptions = {
  message: string;
  code: ErrorCode;
  step?: string;
  details?: Record<string, unknown>;
  suggestions?: string[];
};

/**
 * Base implementation for all specialized research error classes
 */
export class BaseResearchError extends Error implements ResearchError {
  code: ErrorCode;
  step?: string;
  details?: Record<string, unknown>;
  suggestions: string[];

  constructor(options: ErrorOptions) {
    super(options.message);
    this.name = 'ResearchError';
    this.code = options.code;
    this.step = options.step;
    this.details = options.details;
    this.suggestions = options.suggestions ?? [];

    // Maintain proper stack traces for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Creates a formatted error message with details for logging
   */
  getFormattedMessage(): string {
    let message = `[${this.code}] ${this.message}`;

    if (this.step) {
      message = `[Step: ${this.step}] ${message}`;
    }

    if (this.suggestions.length > 0) {
      message += `\nSuggestions:\n${this.suggestions.map((s) => `- ${s}`).join('\n')}`;
    }

    return message;
  }
}

type SpecializedOptions = Omit<ErrorOptions, 'code'>;

/**
 * Error thrown when there are issues with the orchestrator configuration
 */
export class ConfigurationError extends BaseResearchError {
  constructor(options: SpecializedOptions) {
    super({ ...options, code: 'configuration_error' });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends BaseResearchError {
  constructor(options: SpecializedOptions & { code?: 'validation_error' | 'invalid_search_query' }) {
    super({ ...options, code: options.code ?? 'validation_error' });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an external collaborator fails: network, quota or a
 * malformed response from the search provider, vector index or language model.
 */
export class ProviderError extends BaseResearchError {
  readonly provider: string;
  readonly statusCode?: number;

  constructor(options: SpecializedOptions & { provider: string; statusCode?: number }) {
    super({
      ...options,
      code: 'provider_error',
      details: {
        ...options.details,
        provider: options.provider,
        statusCode: options.statusCode,
      },
    });
    this.name = 'ProviderError';
    this.provider = options.provider;
    this.statusCode = options.statusCode;
  }
}

/**
 * Error thrown when a step exceeds its time budget
 */
export class TimeoutError extends BaseResearchError {
  readonly timeoutMs: number;

  constructor(options: SpecializedOptions & { timeoutMs: number }) {
    super({ ...options, code: 'step_timeout', details: { ...options.details, timeoutMs: options.timeoutMs } });
    this.name = 'TimeoutError';
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Error thrown when the pipeline itself is misused: a step writing state it
 * does not own, a status moving backwards, a step running twice.
 */
export class PipelineError extends BaseResearchError {
  constructor(
    options: SpecializedOptions & {
      code?: 'pipeline_error' | 'invariant_violation' | 'invalid_status_transition';
    }
  ) {
    super({ ...options, code: options.code ?? 'pipeline_error' });
    this.name = 'PipelineError';
  }
}

/**
 * Error thrown when a query identifier is unknown to the lifecycle store
 */
export class NotFoundError extends BaseResearchError {
  readonly queryId: string;

  constructor(queryId: string) {
    super({
      message: `Research query not found: ${queryId}`,
      code: 'query_not_found',
      details: { queryId },
      suggestions: ['Use an identifier returned by submit()'],
    });
    this.name = 'NotFoundError';
    this.queryId = queryId;
  }
}

/**
 * Error thrown when a report is requested before the query completed
 */
export class NotReadyError extends BaseResearchError {
  readonly queryId: string;
  readonly status: ResearchStatus;

  constructor(queryId: string, status: ResearchStatus) {
    super({
      message: `Report for query ${queryId} is not available (status: ${status})`,
      code: 'report_not_ready',
      details: { queryId, status },
      suggestions:
        status === 'failed'
          ? ['Inspect the step errors with getResult()', 'Submit the query again']
          : ['Poll getStatus() until the query reaches "completed"'],
    });
    this.name = 'NotReadyError';
    this.queryId = queryId;
    this.status = status;
  }
}

/**
 * Type guard to check if an error is a ResearchError
 */
export function isResearchError(error: unknown): error is BaseResearchError {
  return error instanceof BaseResearchError;
}

/**
 * Type guard to check if an error is a ProviderError
 */
export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Type guard to check if an error is a TimeoutError
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Type guard to check if an error is a NotFoundError
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Type guard to check if an error is a NotReadyError
 */
export function isNotReadyError(error: unknown): error is NotReadyError {
  return error instanceof NotReadyError;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Type guard to check if an error is a PipelineError
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Normalizes any thrown value into a research error attributed to `step`.
 * Research errors pass through unchanged.
 */
export function toResearchError(error: unknown, step?: string): BaseResearchError {
  if (isResearchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new BaseResearchError({
      message: error.message,
      code: 'step_execution_error',
      step,
      details: { originalError: error, stack: error.stack },
    });
  }

  return new BaseResearchError({
    message: step ? `Unknown error in step ${step}` : 'Unknown error',
    code: 'unknown_error',
    step,
    details: { originalError: error },
  });
}

/**
 * Extracts a printable message from any thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
