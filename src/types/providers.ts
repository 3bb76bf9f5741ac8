/**
 * Contracts of the external collaborators called by the pipeline steps.
 * Implementations must be safe to share between concurrently running queries.
 */
import type { RetrievedDocument, SearchResult, StepName } from './pipeline.js';

export interface SearchCallOptions {
  maxResults?: number;
  abortSignal?: AbortSignal;
}

/**
 * Returns ranked web snippets for a query.
 * Fails with a ProviderError on network or quota failure.
 */
export interface WebSearchProvider {
  readonly name: string;
  search(query: string, options?: SearchCallOptions): Promise<SearchResult[]>;
}

/**
 * Document store queried by similarity
 */
export interface VectorIndex {
  query(query: string, topK: number, options?: { abortSignal?: AbortSignal }): Promise<RetrievedDocument[]>;
  /** Adds documents and returns their ids, in input order */
  index(texts: string[], metadatas: Record<string, unknown>[]): Promise<string[]>;
}

/**
 * Structured context accompanying a completion request
 */
export interface CompletionContext {
  /** The step asking for the completion */
  step: StepName;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
}

/**
 * Text completion against a language model.
 * Fails with a ProviderError on quota, timeout or malformed response.
 */
export interface LanguageModelClient {
  complete(prompt: string, context: CompletionContext): Promise<string>;
}
