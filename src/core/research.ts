/**
 * Builds a research orchestrator wired to real collaborators from configuration
 *
 * @module core/research
 */
import { createOpenAI } from '@ai-sdk/openai';
import { google } from 'omnisearch-sdk';
import { assertProviderCredentials, ResearchConfig } from '../config.js';
import { OmnisearchProvider } from '../providers/omnisearch.js';
import { AiSdkLanguageModel } from '../providers/languageModel.js';
import { EmbeddingVectorIndex } from '../providers/vectorIndex.js';
import { QueryLifecycleStore } from '../types/store.js';
import { ResearchReport } from '../types/pipeline.js';
import { ResearchOrchestrator } from './orchestrator.js';

/**
 * Creates an orchestrator that searches with Google through omnisearch-sdk,
 * writes with an OpenAI chat model and retrieves documents from an in-memory
 * index embedded with an OpenAI embedding model.
 *
 * @throws {ConfigurationError} when a required API key is missing
 *
 * @example
 * ```typescript
 * const orchestrator = createResearchOrchestrator(loadConfig());
 * await orchestrator.indexDocuments(['Entangled particles share a quantum state.']);
 * const report = await orchestrator.executeFull('What is quantum entanglement?');
 * ```
 */
export function createResearchOrchestrator(
  config: ResearchConfig,
  overrides: { store?: QueryLifecycleStore } = {}
): ResearchOrchestrator {
  assertProviderCredentials(config);

  const openai = createOpenAI({ apiKey: config.openaiApiKey });

  return new ResearchOrchestrator({
    search: new OmnisearchProvider(google.configure({ apiKey: config.googleSearchApiKey, cx: config.googleSearchCx })),
    index: new EmbeddingVectorIndex(openai.embedding(config.embeddingModel)),
    llm: new AiSdkLanguageModel(openai(config.model)),
    store: overrides.store,
    stepTimeout: config.stepTimeoutMs,
    maxSearchResults: config.maxSearchResults,
    topK: config.documentTopK,
    errorHandling: config.errorHandling,
    logLevel: config.logLevel,
  });
}

/**
 * One-shot research: runs a single query to completion and returns its report
 *
 * @throws {NotReadyError} when the pipeline produced no report
 */
export async function research(queryText: string, config: ResearchConfig): Promise<ResearchReport> {
  return createResearchOrchestrator(config).executeFull(queryText);
}
