import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../common/types/errors.js';

import type { FiscalYearWindow } from './types.js';

/** Month (1-based) in which a new fiscal year begins. */
export const FISCAL_YEAR_START_MONTH = 10;

const YEAR_RE = /^\d{4}$/;
const RANGE_RE = /^(\d{4})-(\d{4})$/;

/**
 * Fiscal year a date falls into: October onwards belongs to the next calendar year.
 */
export const currentFiscalYear = (date: Date): number => {
  const year = date.getUTCFullYear();
  return date.getUTCMonth() + 1 >= FISCAL_YEAR_START_MONTH ? year + 1 : year;
};

export const fiscalYearWindow = (year: number): FiscalYearWindow => {
  const shortYear = String(year).slice(-2);
  return {
    year,
    label: `FY ${shortYear}`,
    code: `FY${shortYear}`,
    shortYear,
    startDate: `${String(year - 1)}-10-01`,
    endDate: `${String(year)}-09-30`,
  };
};

/**
 * The current fiscal year and the `count - 1` years before it, ascending.
 */
export const recentFiscalYears = (date: Date, count = 3): number[] => {
  const current = currentFiscalYear(date);
  return Array.from({ length: count }, (_, index) => current - (count - 1) + index);
};

/**
 * Parses "2019" and "2005-2019" tokens into an ascending list of distinct years.
 */
export const parseFiscalYears = (tokens: readonly string[]): Result<number[], ValidationError> => {
  const years = new Set<number>();

  for (const raw of tokens) {
    const token = raw.trim();

    if (YEAR_RE.test(token)) {
      years.add(Number.parseInt(token, 10));
      continue;
    }

    const range = RANGE_RE.exec(token);
    if (range?.[1] === undefined || range[2] === undefined) {
      return err(
        createValidationError(
          `Invalid fiscal year '${raw}': expected YYYY or YYYY-YYYY`,
          'fiscalYear',
          raw
        )
      );
    }

    const start = Number.parseInt(range[1], 10);
    const end = Number.parseInt(range[2], 10);
    if (start > end) {
      return err(
        createValidationError(
          `Invalid fiscal year range '${raw}': start is after end`,
          'fiscalYear',
          raw
        )
      );
    }

    for (let year = start; year <= end; year++) {
      years.add(year);
    }
  }

  if (years.size === 0) {
    return err(createValidationError('At least one fiscal year is required', 'fiscalYear'));
  }

  return ok([...years].sort((a, b) => a - b));
};
