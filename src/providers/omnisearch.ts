/**
 * Web search provider backed by omnisearch-sdk
 */
import {
  webSearch as performWebSearch,
  SearchProvider as SDKSearchProvider,
  SearchResult as SDKSearchResult,
} from 'omnisearch-sdk';
import { SearchResult } from '../types/pipeline.js';
import { SearchCallOptions, WebSearchProvider } from '../types/providers.js';
import { ProviderError, describeError } from '../types/errors.js';

export interface OmnisearchProviderOptions {
  /** Language code for results (e.g., 'en') */
  language?: string;
  /** Country/region code (e.g., 'US') */
  region?: string;
  /** Content filtering level */
  safeSearch?: 'off' | 'moderate' | 'strict';
}

/**
 * Convert SDK search results to our internal format
 */
export function convertSearchResults(sdkResults: SDKSearchResult[]): SearchResult[] {
  return sdkResults.map((result) => ({
    title: result.title,
    snippet: result.snippet ?? '',
    sourceUrl: result.url,
  }));
}

/**
 * Searches the web through one configured omnisearch-sdk provider
 *
 * @example
 * ```typescript
 * import { google } from 'omnisearch-sdk';
 *
 * const search = new OmnisearchProvider(
 *   google.configure({ apiKey: process.env.GOOGLE_SEARCH_API_KEY, cx: process.env.GOOGLE_SEARCH_CX })
 * );
 * ```
 */
export class OmnisearchProvider implements WebSearchProvider {
  readonly name: string;

  constructor(
    private readonly provider: SDKSearchProvider,
    private readonly options: OmnisearchProviderOptions = {}
  ) {
    this.name = provider.name;
  }

  async search(query: string, options: SearchCallOptions = {}): Promise<SearchResult[]> {
    const { language, region, safeSearch = 'moderate' } = this.options;

    try {
      const results = await performWebSearch({
        query,
        maxResults: options.maxResults ?? 10,
        language,
        region,
        safeSearch,
        provider: [this.provider],
      });
      return convertSearchResults(results);
    } catch (error: unknown) {
      throw new ProviderError({
        message: `Search provider "${this.name}" failed: ${describeError(error)}`,
        provider: this.name,
        details: { originalError: error, query },
        suggestions: [
          'Verify the search API key is valid and has remaining quota',
          "Check that the search provider's API endpoint is reachable",
        ],
      });
    }
  }
}
