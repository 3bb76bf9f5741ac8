import type { SearchProvider } from 'omnisearch-sdk';
import { OmnisearchProvider } from '../../src/providers/omnisearch';
import { ProviderError } from '../../src/types/errors';

const mockWebSearch = jest.fn();

// Mock the omnisearch-sdk module
jest.mock('omnisearch-sdk', () => ({
  webSearch: (...args: unknown[]) => mockWebSearch(...args),
}));

const sdkProvider: SearchProvider = {
  name: 'google',
  config: { apiKey: 'test-secret' },
  search: async () => [],
};

describe('OmnisearchProvider', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should take its name from the SDK provider', () => {
    expect(new OmnisearchProvider(sdkProvider).name).toBe('google');
  });

  it('should call webSearch with the configured provider and convert results', async () => {
    mockWebSearch.mockResolvedValue([
      { title: 'Result 1', url: 'https://example.com/1', snippet: 'Snippet 1' },
      { title: 'Result 2', url: 'https://example.com/2' },
    ]);

    const results = await new OmnisearchProvider(sdkProvider, { language: 'en' }).search('dark matter', {
      maxResults: 3,
    });

    expect(mockWebSearch).toHaveBeenCalledWith({
      query: 'dark matter',
      maxResults: 3,
      language: 'en',
      region: undefined,
      safeSearch: 'moderate',
      provider: [sdkProvider],
    });
    expect(results).toEqual([
      { title: 'Result 1', snippet: 'Snippet 1', sourceUrl: 'https://example.com/1' },
      { title: 'Result 2', snippet: '', sourceUrl: 'https://example.com/2' },
    ]);
  });

  it('should ask for 10 results when no limit is given', async () => {
    mockWebSearch.mockResolvedValue([]);

    await new OmnisearchProvider(sdkProvider).search('dark matter');

    expect(mockWebSearch).toHaveBeenCalledWith(expect.objectContaining({ maxResults: 10 }));
  });

  it('should wrap SDK failures in a ProviderError', async () => {
    mockWebSearch.mockRejectedValue(new Error('Search API failure'));

    const search = new OmnisearchProvider(sdkProvider).search('dark matter');

    await expect(search).rejects.toBeInstanceOf(ProviderError);
    await expect(search).rejects.toMatchObject({
      message: 'Search provider "google" failed: Search API failure',
      provider: 'google',
    });
  });
});
