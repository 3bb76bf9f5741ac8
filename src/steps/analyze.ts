/**
 * Analysis step for the research pipeline
 *
 * Synthesizes the web search results and retrieved documents gathered so far
 * into a single analysis text. Either source list may be empty when an earlier
 * step failed; the analysis then works from whatever remains.
 *
 * @module steps/analyze
 * @category Steps
 */
import { createStep } from '../utils/steps.js';
import { ResearchState, ResearchStep } from '../types/pipeline.js';
import { LanguageModelClient } from '../types/providers.js';
import { ProviderError, describeError, isResearchError } from '../types/errors.js';

export const NO_SOURCES_ANALYSIS = 'No sources found for analysis.';

/**
 * Options for the analysis step
 */
export interface AnalyzeOptions {
  llm: LanguageModelClient;
  /** Temperature for the LLM (0.0 to 1.0) */
  temperature?: number;
  /** Characters of each source included in the prompt */
  maxSourceChars?: number;
  /** Custom system prompt for analysis */
  customPrompt?: string;
}

/**
 * Default analysis prompt
 */
const DEFAULT_ANALYSIS_PROMPT = `
You are an expert research analyst. Your task is to analyze the provided research
sources and extract the key insights they contain. Stay objective and evidence-based,
and say so when the sources do not support a conclusion.
`;

/**
 * A source as presented to the model
 */
interface PromptSource {
  title?: string;
  url?: string;
  content: string;
}

/**
 * Collects search results first, then retrieved documents
 */
function collectSources(state: ResearchState): PromptSource[] {
  const fromSearch = state.searchResults.map((result) => ({
    title: result.title,
    url: result.sourceUrl,
    content: result.snippet,
  }));

  const fromDocuments = state.retrievedDocuments.map((document) => {
    const { title, url, source } = document.metadata;
    return {
      title: typeof title === 'string' ? title : undefined,
      url: typeof url === 'string' ? url : typeof source === 'string' ? source : undefined,
      content: document.content,
    };
  });

  return [...fromSearch, ...fromDocuments];
}

/**
 * Formats sources as numbered blocks, each truncated to `maxSourceChars`
 */
export function formatSources(sources: PromptSource[], maxSourceChars: number): string {
  return sources
    .map((source, i) => {
      const lines = [`Source ${i + 1}:`];
      if (source.title) lines.push(`Title: ${source.title}`);
      if (source.url) lines.push(`URL: ${source.url}`);
      const content =
        source.content.length > maxSourceChars
          ? `${source.content.substring(0, maxSourceChars)}...`
          : source.content;
      lines.push(`Content: ${content}`);
      return lines.join('\n');
    })
    .join('\n\n');
}

export function buildAnalysisPrompt(query: string, sourcesText: string): string {
  return `
Research question: "${query}"

Analyze the following research sources and provide key insights:

${sourcesText}

Please provide:
1. Main themes and patterns
2. Key findings
3. Contradictions or discrepancies (if any)
4. Confidence level in the findings
5. Gaps or areas needing further research
`;
}

/**
 * Creates the analysis step
 *
 * Reads `queryText`, `searchResults` and `retrievedDocuments`; writes `analysis`.
 */
export function analyze(options: AnalyzeOptions): ResearchStep {
  return createStep(
    'analysis',
    async (state, { llm, temperature = 0.5, maxSourceChars = 500, customPrompt }, { context, logger }) => {
      const sources = collectSources(state);

      if (sources.length === 0) {
        logger.warn('No sources available for analysis');
        return { analysis: NO_SOURCES_ANALYSIS };
      }

      logger.debug(
        `Analyzing ${state.searchResults.length} search results and ${state.retrievedDocuments.length} documents`
      );

      const prompt = buildAnalysisPrompt(state.queryText, formatSources(sources, maxSourceChars));

      let text: string;
      try {
        text = await llm.complete(prompt, {
          step: 'analysis',
          system: customPrompt ?? DEFAULT_ANALYSIS_PROMPT,
          temperature,
          abortSignal: context.abortSignal,
        });
      } catch (error: unknown) {
        if (isResearchError(error)) throw error;
        throw new ProviderError({
          message: `Analysis failed: ${describeError(error)}`,
          provider: 'language-model',
          step: 'analysis',
          details: { originalError: error },
        });
      }

      const analysis = text.trim();
      if (!analysis) {
        throw new ProviderError({
          message: 'Language model returned an empty analysis',
          provider: 'language-model',
          step: 'analysis',
        });
      }

      logger.info(`Analysis completed with ${sources.length} sources`);
      return { analysis };
    },
    options
  );
}
