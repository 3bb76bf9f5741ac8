/**
 * Shared fixtures and fakes for the test suites
 */
import { createInitialState } from '../src/core/state';
import type { ResearchState, RetrievedDocument, SearchResult } from '../src/types/pipeline';
import type {
  CompletionContext,
  LanguageModelClient,
  SearchCallOptions,
  VectorIndex,
  WebSearchProvider,
} from '../src/types/providers';

export const TEST_QUERY_ID = 'query-1';

export function createMockState(overrides: Partial<ResearchState> = {}): ResearchState {
  return { ...createInitialState('What is quantum entanglement?', TEST_QUERY_ID), ...overrides };
}

export const sampleSearchResults: SearchResult[] = [
  { title: 'Entanglement explained', snippet: 'Two particles share one state.', sourceUrl: 'https://example.com/a' },
  { title: 'Bell tests', snippet: 'Experiments rule out local hidden variables.', sourceUrl: 'https://example.com/b' },
];

export const sampleDocuments: RetrievedDocument[] = [
  { content: 'Lecture notes on quantum correlations.', metadata: { source: 'notes.md' }, score: 0.9 },
];

export const SAMPLE_REPORT = `## Executive Summary
Entanglement links the states of particles.

## Key Findings
Correlations persist at a distance.`;

export type FakeSearch = WebSearchProvider & {
  search: jest.Mock<Promise<SearchResult[]>, [string, SearchCallOptions?]>;
};

export function createFakeSearch(results: SearchResult[] = sampleSearchResults): FakeSearch {
  return {
    name: 'fake-search',
    search: jest.fn<Promise<SearchResult[]>, [string, SearchCallOptions?]>().mockResolvedValue(results),
  };
}

export type FakeIndex = VectorIndex & {
  query: jest.Mock<Promise<RetrievedDocument[]>, [string, number, { abortSignal?: AbortSignal }?]>;
  index: jest.Mock<Promise<string[]>, [string[], Record<string, unknown>[]]>;
};

export function createFakeIndex(documents: RetrievedDocument[] = sampleDocuments): FakeIndex {
  return {
    query: jest
      .fn<Promise<RetrievedDocument[]>, [string, number, { abortSignal?: AbortSignal }?]>()
      .mockResolvedValue(documents),
    index: jest
      .fn<Promise<string[]>, [string[], Record<string, unknown>[]]>()
      .mockImplementation(async (texts) => texts.map((_, i) => `doc-${i + 1}`)),
  };
}

export type FakeLlm = LanguageModelClient & {
  complete: jest.Mock<Promise<string>, [string, CompletionContext]>;
};

/**
 * Answers analysis prompts with `analysis` and report prompts with `report`
 */
export function createFakeLlm(analysis = 'Sources agree that entanglement is real.', report = SAMPLE_REPORT): FakeLlm {
  return {
    complete: jest
      .fn<Promise<string>, [string, CompletionContext]>()
      .mockImplementation(async (_prompt, context) => (context.step === 'analysis' ? analysis : report)),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Never settles until aborted, then rejects with the abort reason
 */
export function hangUntilAborted<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(signal.reason));
  });
}

export function silenceConsole(): void {
  jest.spyOn(console, 'info').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'debug').mockImplementation(() => {});
}
