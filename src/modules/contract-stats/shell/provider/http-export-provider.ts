import { err, ok, type Result } from 'neverthrow';

import {
  createHttpStatusError,
  createNetworkError,
  createTimeoutError,
  type ProviderError,
} from '../../core/errors.js';
import { fiscalYearWindow } from '../../core/fiscal-year.js';

import type { ExportProvider } from '../../core/ports.js';
import type { ExportRequest } from '../../core/types.js';

export type FetchFn = typeof fetch;

export interface HttpExportProviderOptions {
  url: string;
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetchFn?: FetchFn;
}

/**
 * Form fields the export endpoint expects for one state and fiscal year.
 */
export const buildExportForm = (request: ExportRequest): URLSearchParams => {
  const window = fiscalYearWindow(request.fiscalYear);

  return new URLSearchParams({
    bus_cat: 'ALL',
    fy: window.label,
    recovery: '0',
    v_center: 'ALL',
    v_database: window.code,
    v_code: '53',
    v_district: 'ALL',
    v_start_date: window.startDate,
    v_end_date: window.endDate,
    v_state: request.state.name.toUpperCase(),
    v_state2: request.state.code,
    action: 'Export to Excel',
  });
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * POSTs the export form once per request. No retries.
 */
export const makeHttpExportProvider = (options: HttpExportProviderOptions): ExportProvider => {
  const fetchFn = options.fetchFn ?? fetch;

  return {
    async fetchExport(request: ExportRequest): Promise<Result<string, ProviderError>> {
      const target = `${request.state.code} ${String(request.fiscalYear)}`;

      let response: Response;
      try {
        response = await fetchFn(options.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: buildExportForm(request).toString(),
          signal: AbortSignal.timeout(options.timeoutMs),
        });
      } catch (error) {
        if (isAbortError(error)) {
          return err(
            createTimeoutError(
              `Export request for ${target} timed out after ${String(options.timeoutMs)}ms`,
              error
            )
          );
        }
        return err(
          createNetworkError(
            `Export request for ${target} failed: ${error instanceof Error ? error.message : String(error)}`,
            error
          )
        );
      }

      if (!response.ok) {
        return err(
          createHttpStatusError(
            response.status,
            `Export request for ${target} returned HTTP ${String(response.status)}`
          )
        );
      }

      try {
        return ok(await response.text());
      } catch (error) {
        return err(
          createNetworkError(`Failed to read export body for ${target}`, error)
        );
      }
    },
  };
};
