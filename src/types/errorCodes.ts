/**
 * Error codes used throughout the research-orchestrator package
 */
export type ErrorCode =
  // Configuration errors
  | 'configuration_error'

  // Validation errors
  | 'validation_error'
  | 'invalid_search_query'

  // Collaborator errors
  | 'provider_error'

  // Pipeline execution errors
  | 'pipeline_error'
  | 'step_execution_error'
  | 'step_timeout'
  | 'invariant_violation'
  | 'invalid_status_transition'

  // Query lifecycle errors
  | 'query_not_found'
  | 'report_not_ready'

  // Generic errors
  | 'unknown_error';

/**
 * Maps error codes to human-readable descriptions
 */
export const ERROR_CODE_DESCRIPTIONS: Record<ErrorCode, string> = {
  configuration_error: 'There was an error in the configuration of the research orchestrator',

  validation_error: 'Validation failed for the input data',
  invalid_search_query: 'The search query is invalid or unsupported',

  provider_error: 'An external provider (search, vector index or language model) failed',

  pipeline_error: 'An error occurred during pipeline execution',
  step_execution_error: 'An error occurred during the execution of a pipeline step',
  step_timeout: 'A pipeline step timed out',
  invariant_violation: 'A step wrote research state it does not own',
  invalid_status_transition: 'The query status cannot move in that direction',

  query_not_found: 'No research query exists with the given identifier',
  report_not_ready: 'The research report is not available for this query',

  unknown_error: 'An unknown error occurred',
};
