/**
 * Run Fiscal Years Use Case
 *
 * Drives the whole export: for each fiscal year and state it fetches the
 * export, folds it into the state-year, fiscal-year and grand-total scopes,
 * and writes the per-year files followed by the grand total.
 */

import { err, ok, type Result } from 'neverthrow';

import { processStateBatch } from './process-state-batch.js';
import { fiscalYearWindow } from '../fiscal-year.js';
import { closeScope, openScope } from '../scope.js';
import { formatRawDump, formatScopeTotals, formatStateSummaries } from '../summary.js';

import type { RunError } from '../errors.js';
import type { ExportProvider, OutputWriter } from '../ports.js';
import type {
  AggregationScope,
  DescriptionNormalizer,
  FiscalYearReport,
  ParseErrorPolicy,
  RunReport,
  StateRef,
  StateSummaryRow,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunFiscalYearsDeps {
  provider: ExportProvider;
  writer: OutputWriter;
  logger: Logger;
  normalizeDescription?: DescriptionNormalizer | undefined;
}

export interface RunFiscalYearsInput {
  /** Ascending, distinct */
  fiscalYears: readonly number[];
  states: readonly StateRef[];
  filePrefix: string;
  /** Defaults to 'abort' */
  onParseError?: ParseErrorPolicy;
}

export const rawDumpFileName = (prefix: string, year: number): string =>
  `${prefix}-FY-${fiscalYearWindow(year).shortYear}-full.tsv`;

export const stateSummaryFileName = (prefix: string, year: number): string =>
  `${prefix}-FY-${fiscalYearWindow(year).shortYear}-summary.tsv`;

export const yearTotalsFileName = (prefix: string, year: number): string =>
  `${prefix}-FY-${fiscalYearWindow(year).shortYear}-totals.tsv`;

export const grandTotalFileName = (prefix: string, first: number, last: number): string =>
  `${prefix}-FY${String(first)}-FY${String(last)}-summary.tsv`;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const runFiscalYears = async (
  deps: RunFiscalYearsDeps,
  input: RunFiscalYearsInput
): Promise<Result<RunReport, RunError>> => {
  const { provider, writer, logger, normalizeDescription } = deps;
  const { fiscalYears, states, filePrefix } = input;
  const onParseError = input.onParseError ?? 'abort';

  const log = logger.child({ usecase: 'runFiscalYears' });

  const grandTotal = openScope('grand-total');
  const years: FiscalYearReport[] = [];
  const files: string[] = [];

  const writeFile = async (fileName: string, contents: string): Promise<Result<void, RunError>> => {
    const result = await writer.write(fileName, contents);
    if (result.isErr()) {
      log.error({ error: result.error, fileName }, 'Failed to write output file');
      return err(result.error);
    }
    files.push(result.value);
    return ok(undefined);
  };

  /** Raw dump (when there are rows) and per-state summary of one year. */
  const writeStateFiles = async (
    year: number,
    header: string | null,
    dumpRows: readonly string[],
    summaryRows: readonly StateSummaryRow[]
  ): Promise<Result<void, RunError>> => {
    if (dumpRows.length > 0) {
      const dumpResult = await writeFile(
        rawDumpFileName(filePrefix, year),
        formatRawDump(header, dumpRows)
      );
      if (dumpResult.isErr()) return err(dumpResult.error);
    }

    return writeFile(stateSummaryFileName(filePrefix, year), formatStateSummaries(summaryRows));
  };

  for (const year of fiscalYears) {
    const window = fiscalYearWindow(year);
    const yearScope: AggregationScope = openScope('fiscal-year');
    const cumulativeScopes = [yearScope, grandTotal];

    const report: Omit<FiscalYearReport, 'totals'> = {
      fiscalYear: year,
      processed: [],
      skipped: [],
      failed: [],
    };
    const summaryRows: StateSummaryRow[] = [];
    const dumpRows: string[] = [];
    let header: string | null = null;

    log.info({ fiscalYear: window.label }, 'Processing fiscal year');

    for (const state of states) {
      const stateLog = log.child({ fiscalYear: year, state: state.code });
      stateLog.debug(`Downloading contract data for ${state.name}`);

      const fetched = await provider.fetchExport({ fiscalYear: year, state });
      if (fetched.isErr()) {
        stateLog.error({ error: fetched.error }, `Request failed for ${state.name}`);
        report.failed.push({
          stateCode: state.code,
          errorType: fetched.error.type,
          message: fetched.error.message,
        });
        continue;
      }

      const batch = processStateBatch({
        state,
        body: fetched.value,
        cumulativeScopes,
        normalizeDescription,
      });

      if (batch.isErr()) {
        stateLog.error({ error: batch.error }, `Failed to parse export for ${state.name}`);
        if (onParseError === 'abort') {
          // States already closed this year are still emitted
          if (summaryRows.length > 0) {
            const flushed = await writeStateFiles(year, header, dumpRows, summaryRows);
            if (flushed.isErr()) return err(flushed.error);
          }
          return err(batch.error);
        }
        report.failed.push({
          stateCode: state.code,
          errorType: batch.error.type,
          message: batch.error.message,
        });
        continue;
      }

      const outcome = batch.value;
      if (outcome.status === 'skipped') {
        stateLog.warn(`Invalid Entry for ${state.name}; skipping`);
        report.skipped.push(state.code);
        continue;
      }

      header ??= outcome.header;
      dumpRows.push(...outcome.dumpRows);
      summaryRows.push({ stateCode: state.code, summary: outcome.summary });
      report.processed.push(state.code);

      stateLog.info(
        {
          contractActions: outcome.dumpRows.length,
          obligations: outcome.summary.all.obligations.toFixed(0),
        },
        `Processed ${state.name}`
      );
    }

    const stateFiles = await writeStateFiles(year, header, dumpRows, summaryRows);
    if (stateFiles.isErr()) return err(stateFiles.error);

    const totals = closeScope(yearScope);
    const totalsResult = await writeFile(
      yearTotalsFileName(filePrefix, year),
      formatScopeTotals(totals)
    );
    if (totalsResult.isErr()) return err(totalsResult.error);

    years.push({ ...report, totals });

    log.info(
      {
        fiscalYear: window.label,
        processed: report.processed.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      },
      'Finished fiscal year'
    );
  }

  const grandSummary = closeScope(grandTotal);
  const first = fiscalYears[0];
  const last = fiscalYears[fiscalYears.length - 1];

  if (first !== undefined && last !== undefined) {
    const grandResult = await writeFile(
      grandTotalFileName(filePrefix, first, last),
      formatScopeTotals(grandSummary)
    );
    if (grandResult.isErr()) return err(grandResult.error);
  }

  log.info({ files: files.length }, 'Done');

  return ok({ years, files, grandTotal: grandSummary });
};
