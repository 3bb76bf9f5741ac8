/**
 * research-orchestrator
 *
 * Runs research queries through a fixed pipeline of web search, document
 * retrieval, analysis and report writing, tracking each query's lifecycle
 * so callers can submit work and collect the report later.
 *
 * @packageDocumentation
 * @module research-orchestrator
 *
 * @example
 * ```typescript
 * import { createResearchOrchestrator, loadConfig } from 'research-orchestrator';
 *
 * const orchestrator = createResearchOrchestrator(loadConfig());
 * const queryId = await orchestrator.submit('What is quantum entanglement?');
 * await orchestrator.waitFor(queryId);
 * const report = await orchestrator.getReport(queryId);
 * ```
 */

// Core functionality
export { ResearchOrchestrator } from './core/orchestrator.js';
export { createResearchOrchestrator, research } from './core/research.js';
export { executePipeline, createDefaultSteps, createInitialState } from './core/pipeline.js';
export {
  extendState,
  assertAppendOnly,
  recordStepFailure,
  recordStepExecution,
  transitionStatus,
  canTransition,
  isTerminalStatus,
} from './core/state.js';

// Research steps
export { searchWeb, validateQuery, deduplicateResults } from './steps/searchWeb.js';
export { retrieveDocuments } from './steps/retrieveDocuments.js';
export { analyze, NO_SOURCES_ANALYSIS } from './steps/analyze.js';
export { writeReport, buildReportTitle, extractSummary } from './steps/writeReport.js';

// Collaborators
export { OmnisearchProvider, convertSearchResults } from './providers/omnisearch.js';
export { AiSdkLanguageModel } from './providers/languageModel.js';
export { EmbeddingVectorIndex } from './providers/vectorIndex.js';
export { InMemoryQueryStore } from './store/memoryStore.js';

// Configuration, errors and logging
export { loadConfig, assertProviderCredentials, DEFAULTS } from './config.js';
export {
  BaseResearchError,
  ConfigurationError,
  ValidationError,
  ProviderError,
  TimeoutError,
  PipelineError,
  NotFoundError,
  NotReadyError,
  isResearchError,
  isProviderError,
  isTimeoutError,
  isNotFoundError,
  isNotReadyError,
  isValidationError,
  isConfigurationError,
  isPipelineError,
} from './types/errors.js';
export { ERROR_CODE_DESCRIPTIONS } from './types/errorCodes.js';
export { Logger, logger, createStepLogger } from './utils/logging.js';
export { createStep } from './utils/steps.js';
export { withTimeout } from './utils/timeout.js';

// Types
export type {
  ResearchState,
  ResearchStep,
  ResearchStatus,
  ResearchReport,
  ReportMetadata,
  StepName,
  StepOutputs,
  StepContext,
  StepExecutionRecord,
  SearchResult,
  RetrievedDocument,
  PipelineConfig,
  ErrorHandlingMode,
} from './types/pipeline.js';
export type {
  WebSearchProvider,
  VectorIndex,
  LanguageModelClient,
  CompletionContext,
  SearchCallOptions,
} from './types/providers.js';
export type { QueryLifecycleStore, QueryRecord, StepResult } from './types/store.js';
export type { ErrorCode } from './types/errorCodes.js';
export type { ResearchConfig } from './config.js';
export type { OrchestratorOptions } from './core/orchestrator.js';
export type { PipelineCollaborators, DefaultStepOptions } from './core/pipeline.js';
export type { WebSearchOptions } from './steps/searchWeb.js';
export type { RetrieveDocumentsOptions } from './steps/retrieveDocuments.js';
export type { AnalyzeOptions } from './steps/analyze.js';
export type { WriteReportOptions } from './steps/writeReport.js';
export type { LogLevel, LogContext, LoggerOptions } from './utils/logging.js';
