/**
 * Report writing step: turns the analysis into the final structured report
 */
import { createStep } from '../utils/steps.js';
import { ResearchReport, ResearchStep, STEP_SEQUENCE } from '../types/pipeline.js';
import { LanguageModelClient } from '../types/providers.js';
import { ProviderError, describeError, isResearchError } from '../types/errors.js';

export interface WriteReportOptions {
  llm: LanguageModelClient;
  /** Temperature for the LLM (0.0 to 1.0) */
  temperature?: number;
  /** Upper bound on the generated report length, in tokens */
  maxTokens?: number;
}

const REPORT_SYSTEM_PROMPT = `
You are a professional research writer. Write clear, well-structured reports in
Markdown, suitable for presentation. Use "##" headings for sections.
`;

const TITLE_QUERY_CHARS = 50;

export function buildReportPrompt(query: string, analysis: string): string {
  return `
Write a comprehensive research report based on the following:

Research Query: ${query}

Analysis and Findings:
${analysis || 'No analysis is available; rely on general knowledge and say so.'}

Please write a professional research report with the following structure:
1. Executive Summary
2. Introduction
3. Key Findings
4. Detailed Analysis
5. Sources and References
6. Conclusions and Recommendations
`;
}

export function buildReportTitle(query: string): string {
  return `Research Report: ${query.substring(0, TITLE_QUERY_CHARS)}`;
}

/**
 * Pulls the executive summary out of a Markdown report. Falls back to the
 * first paragraph that is not a heading.
 */
export function extractSummary(content: string): string {
  const lines = content.split('\n');
  const headingIndex = lines.findIndex((line) => /^#{1,6}\s*(\d+\.\s*)?executive summary\b/i.test(line.trim()));

  if (headingIndex >= 0) {
    const body: string[] = [];
    for (const line of lines.slice(headingIndex + 1)) {
      if (/^#{1,6}\s/.test(line.trim())) break;
      body.push(line);
    }
    const summary = body.join('\n').trim();
    if (summary) return summary;
  }

  const paragraphs = content
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph && !paragraph.startsWith('#'));

  return paragraphs[0] ?? '';
}

/**
 * Creates the report writing step
 *
 * Reads `queryText` and `analysis` (plus the source counts for metadata);
 * writes `report`. An empty completion fails the step, leaving no report.
 */
export function writeReport(options: WriteReportOptions): ResearchStep {
  return createStep(
    'report_writing',
    async (state, { llm, temperature = 0.7, maxTokens }, { context, logger }) => {
      const degradedSteps = STEP_SEQUENCE.filter((name) => state.stepErrors[name] !== undefined);
      if (degradedSteps.length > 0) {
        logger.warn(`Writing report on degraded input (failed: ${degradedSteps.join(', ')})`);
      }

      let text: string;
      try {
        text = await llm.complete(buildReportPrompt(state.queryText, state.analysis), {
          step: 'report_writing',
          system: REPORT_SYSTEM_PROMPT,
          temperature,
          maxTokens,
          abortSignal: context.abortSignal,
        });
      } catch (error: unknown) {
        if (isResearchError(error)) throw error;
        throw new ProviderError({
          message: `Report generation failed: ${describeError(error)}`,
          provider: 'language-model',
          step: 'report_writing',
          details: { originalError: error },
        });
      }

      const content = text.trim();
      if (!content) {
        throw new ProviderError({
          message: 'Language model returned an empty report',
          provider: 'language-model',
          step: 'report_writing',
        });
      }

      const report: ResearchReport = {
        title: buildReportTitle(state.queryText),
        content,
        summary: extractSummary(content),
        metadata: {
          query: state.queryText,
          generatedAt: new Date().toISOString(),
          webResultsCount: state.searchResults.length,
          documentCount: state.retrievedDocuments.length,
          degradedSteps,
        },
      };

      logger.info(`Report generated (${content.length} characters)`);
      return { report };
    },
    options
  );
}
