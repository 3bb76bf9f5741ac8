/**
 * Web search step for the research pipeline
 */
import { z } from 'zod';
import { createStep } from '../utils/steps.js';
import { ResearchStep, SearchResult } from '../types/pipeline.js';
import { WebSearchProvider } from '../types/providers.js';
import { ProviderError, ValidationError, describeError, isResearchError } from '../types/errors.js';

const MAX_QUERY_LENGTH = 2000;

// Results without a usable URL are dropped rather than failing the step
const searchResultSchema = z.object({
  title: z.string(),
  snippet: z.string(),
  sourceUrl: z.string().min(1),
});

/**
 * Options for the web search step
 */
export interface WebSearchOptions {
  /** Provider answering the search */
  provider: WebSearchProvider;
  /** Maximum number of results to keep */
  maxResults?: number;
}

/**
 * Validate search query
 */
export function validateQuery(query: string): string {
  const cleanedQuery = query.trim();

  if (!cleanedQuery) {
    throw new ValidationError({
      message: 'Invalid search query: Empty or whitespace only',
      code: 'invalid_search_query',
      step: 'web_search',
      suggestions: ['Provide a non-empty research query'],
    });
  }

  if (cleanedQuery.length > MAX_QUERY_LENGTH) {
    throw new ValidationError({
      message: `Search query too long (${cleanedQuery.length} chars)`,
      code: 'invalid_search_query',
      step: 'web_search',
      suggestions: [`Shorten the research query to under ${MAX_QUERY_LENGTH} characters`],
    });
  }

  return cleanedQuery;
}

/**
 * Keeps the first occurrence of each URL, preserving rank order
 */
export function deduplicateResults(results: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  return results.filter((result) => {
    if (seen.has(result.sourceUrl)) return false;
    seen.add(result.sourceUrl);
    return true;
  });
}

/**
 * Creates the web search step
 *
 * Reads `queryText`, writes `searchResults`.
 *
 * @example
 * ```typescript
 * searchWeb({ provider: new OmnisearchProvider(google.configure({ apiKey, cx })), maxResults: 5 })
 * ```
 */
export function searchWeb(options: WebSearchOptions): ResearchStep {
  return createStep(
    'web_search',
    async (state, { provider, maxResults = 5 }, { context, logger }) => {
      const query = validateQuery(state.queryText);

      logger.debug(`Searching "${provider.name}" for: "${query}"`);

      let rawResults: SearchResult[];
      try {
        rawResults = await provider.search(query, {
          maxResults,
          abortSignal: context.abortSignal,
        });
      } catch (error: unknown) {
        if (isResearchError(error)) throw error;
        throw new ProviderError({
          message: `Web search failed: ${describeError(error)}`,
          provider: provider.name,
          step: 'web_search',
          details: { originalError: error, query },
        });
      }

      const validResults = rawResults.filter((result) => searchResultSchema.safeParse(result).success);
      if (validResults.length < rawResults.length) {
        logger.warn(`Dropped ${rawResults.length - validResults.length} results without a source URL`);
      }

      const uniqueResults = deduplicateResults(validResults);
      logger.debug(`Deduplicated ${validResults.length} results to ${uniqueResults.length} unique URLs`);

      const searchResults = uniqueResults.slice(0, maxResults);
      if (searchResults.length === 0) {
        logger.warn('No search results found, continuing anyway');
      } else {
        logger.info(`Found ${searchResults.length} search results`);
      }

      return { searchResults };
    },
    options
  );
}
