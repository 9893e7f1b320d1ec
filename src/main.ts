/**
 * Export runner entry point
 * Fetches every (state, fiscal year) export and writes the TSV summaries
 */

import { USAGE, parseCliArgs } from './cli/args.js';
import { describeError } from './common/types/errors.js';
import { parseEnv, createConfig } from './infra/config/env.js';
import { createLogger } from './infra/logger/index.js';
import {
  createDescriptionNormalizer,
  loadAcronyms,
  loadStates,
  makeFsOutputWriter,
  makeHttpExportProvider,
  recentFiscalYears,
  runFiscalYears,
  selectStates,
  type DescriptionNormalizer,
} from './modules/contract-stats/index.js';

const main = async (): Promise<number> => {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.isErr()) {
    console.error(command.error.message);
    console.error(USAGE);
    return 1;
  }

  if (command.value.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const options = command.value.options;

  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  const registry = await loadStates(config.reference.statesFile);
  if (registry.isErr()) {
    logger.fatal({ error: registry.error }, 'Failed to load state registry');
    return 1;
  }

  const states = selectStates(registry.value, options.states);
  if (states.isErr()) {
    logger.fatal({ error: states.error }, describeError(states.error));
    return 1;
  }

  let normalizeDescription: DescriptionNormalizer | undefined;
  if (config.reference.acronymsFile !== undefined) {
    const acronyms = await loadAcronyms(config.reference.acronymsFile);
    if (acronyms.isErr()) {
      logger.fatal({ error: acronyms.error }, 'Failed to load acronym reference');
      return 1;
    }
    normalizeDescription = createDescriptionNormalizer(acronyms.value);
  }

  const fiscalYears = options.fiscalYears ?? recentFiscalYears(new Date());
  const outputDir = options.outputDir ?? config.output.dir;

  logger.info({ fiscalYears, outputDir, states: states.value.length }, 'Fetching contracts');

  const result = await runFiscalYears(
    {
      provider: makeHttpExportProvider({
        url: config.exportService.url,
        timeoutMs: config.exportService.timeoutMs,
      }),
      writer: makeFsOutputWriter({ outputDir }),
      logger,
      normalizeDescription,
    },
    {
      fiscalYears,
      states: states.value,
      filePrefix: config.output.filePrefix,
      onParseError: options.onParseError,
    }
  );

  if (result.isErr()) {
    logger.fatal({ error: result.error }, describeError(result.error));
    return 1;
  }

  const failed = result.value.years.reduce((count, year) => count + year.failed.length, 0);
  logger.info(
    { files: result.value.files, failedStates: failed },
    `Wrote ${String(result.value.files.length)} file(s) to ${outputDir}`
  );

  return 0;
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
