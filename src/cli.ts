#!/usr/bin/env node
/**
 * research-orchestrator CLI
 */
import 'dotenv/config';
import { Command, Option } from 'commander';
import { readFile } from 'fs/promises';
import path from 'path';
import { loadConfig } from './config.js';
import { createResearchOrchestrator } from './core/research.js';
import { isResearchError, isNotReadyError } from './types/errors.js';
import { LOG_LEVELS, LogLevel, logger } from './utils/logging.js';

const program = new Command();

program
  .name('research-orchestrator')
  .description('Run a research query through web search, document retrieval, analysis and report writing')
  .version('0.1.0');

program
  .command('research')
  .description('Research a question and print the report')
  .argument('<query>', 'the research question')
  .option('-d, --docs <files...>', 'text files to index for document retrieval')
  .option('--json', 'print the full query record (status, results, step errors, report) as JSON')
  .addOption(new Option('-l, --log-level <level>', 'minimum log level').choices([...LOG_LEVELS]))
  .action(async (query: string, options: { docs?: string[]; json?: boolean; logLevel?: LogLevel }) => {
    const config = loadConfig();
    if (options.logLevel) {
      config.logLevel = options.logLevel;
    }

    const orchestrator = createResearchOrchestrator(config);

    if (options.docs && options.docs.length > 0) {
      const texts = await Promise.all(options.docs.map((file) => readFile(file, 'utf8')));
      await orchestrator.indexDocuments(
        texts,
        options.docs.map((file) => ({ source: path.basename(file), path: path.resolve(file) }))
      );
    }

    const queryId = await orchestrator.submit(query);
    await orchestrator.waitFor(queryId);

    if (options.json) {
      console.log(JSON.stringify(await orchestrator.getResult(queryId), null, 2));
      return;
    }

    try {
      const report = await orchestrator.getReport(queryId);
      console.log(`# ${report.title}\n\n${report.content}`);
    } catch (error: unknown) {
      if (isNotReadyError(error)) {
        const { stepErrors } = await orchestrator.getResult(queryId);
        for (const [step, description] of Object.entries(stepErrors)) {
          logger.error(`${step}: ${description}`);
        }
      }
      throw error;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(isResearchError(error) ? error.getFormattedMessage() : error);
  process.exitCode = 1;
});
