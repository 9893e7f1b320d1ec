/**
 * Command line parsing for the export runner.
 *
 * Usage:
 *   tsx src/main.ts --fiscal-year 2017 2018 2019
 *   tsx src/main.ts -fy 2005-2019 -dir out --states CA,TX --on-parse-error skip-state
 *
 * Options:
 *   -fy, --fiscal-year: one or more fiscal years or YYYY-YYYY ranges
 *                       (defaults to the current fiscal year and the two before it)
 *   -dir, --output-dir: directory for the TSV files (defaults to OUTPUT_DIR)
 *   --states: comma-separated state codes (defaults to every state in the registry)
 *   --on-parse-error: abort | skip-state (defaults to abort)
 *   -h, --help: print this message
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../common/types/errors.js';
import { parseFiscalYears } from '../modules/contract-stats/core/fiscal-year.js';

import type { ParseErrorPolicy } from '../modules/contract-stats/core/types.js';

export const USAGE = `Usage: main [options]

Fetch contract exports per state and fiscal year and write TSV summaries.

Options:
  -fy, --fiscal-year <year...>   fiscal years or YYYY-YYYY ranges (default: last three)
  -dir, --output-dir <dir>       output directory (default: OUTPUT_DIR or "data")
  --states <codes>               comma-separated state codes (default: all)
  --on-parse-error <policy>      abort | skip-state (default: abort)
  -h, --help                     show this message
`;

export interface CliOptions {
  /** Undefined when no year was given */
  fiscalYears: number[] | undefined;
  outputDir: string | undefined;
  states: string[];
  onParseError: ParseErrorPolicy;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

const isFlag = (token: string): boolean => token.startsWith('-') && !/^-?\d/.test(token);

const isParseErrorPolicy = (value: string): value is ParseErrorPolicy =>
  value === 'abort' || value === 'skip-state';

export const parseCliArgs = (argv: readonly string[]): Result<CliCommand, ValidationError> => {
  const yearTokens: string[] = [];
  let outputDir: string | undefined;
  let states: string[] = [];
  let onParseError: ParseErrorPolicy = 'abort';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        return ok({ kind: 'help' });

      case '-fy':
      case '--fiscal-year': {
        const start = yearTokens.length;
        while (i + 1 < argv.length && !isFlag(argv[i + 1] ?? '')) {
          yearTokens.push(argv[i + 1] ?? '');
          i++;
        }
        if (yearTokens.length === start) {
          return err(createValidationError(`${arg} requires at least one year`, 'fiscalYear'));
        }
        break;
      }

      case '-dir':
      case '--output-dir': {
        const value = argv[i + 1];
        if (value === undefined || isFlag(value)) {
          return err(createValidationError(`${arg} requires a directory`, 'outputDir'));
        }
        outputDir = value;
        i++;
        break;
      }

      case '--states': {
        const value = argv[i + 1];
        if (value === undefined || isFlag(value)) {
          return err(createValidationError(`${arg} requires a list of state codes`, 'states'));
        }
        states = value
          .split(',')
          .map((code) => code.trim())
          .filter((code) => code !== '');
        i++;
        break;
      }

      case '--on-parse-error': {
        const value = argv[i + 1] ?? '';
        if (!isParseErrorPolicy(value)) {
          return err(
            createValidationError(
              `${arg} must be 'abort' or 'skip-state'`,
              'onParseError',
              value
            )
          );
        }
        onParseError = value;
        i++;
        break;
      }

      default:
        return err(createValidationError(`Unknown argument '${arg}'`, 'argv', arg));
    }
  }

  let fiscalYears: number[] | undefined;
  if (yearTokens.length > 0) {
    const parsed = parseFiscalYears(yearTokens);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    fiscalYears = parsed.value;
  }

  return ok({ kind: 'run', options: { fiscalYears, outputDir, states, onParseError } });
};
