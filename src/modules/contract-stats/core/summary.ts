/**
 * TSV rendering of closed scopes.
 *
 * All functions are pure; formatting the same summary twice yields the same text.
 */

import { Decimal } from 'decimal.js';

import { CATEGORY_ORDER } from './scope.js';
import { Category, type ScopeSummary, type StateSummaryRow, type TallySummary } from './types.js';

const SEPARATOR = '\t';
const NEWLINE = '\n';

interface CategoryColumns {
  count: string;
  obligations: string;
  totalObligations: string;
}

const CATEGORY_COLUMNS: Record<Category, CategoryColumns> = {
  [Category.SMALL_BUSINESS]: {
    count: 'Small Businesses',
    obligations: 'Small Business Obligations',
    totalObligations: 'Small Business Total Obligations',
  },
  [Category.WOMAN_OWNED]: {
    count: 'Woman Owned',
    obligations: 'Woman Owned Obligations',
    totalObligations: 'Woman Owned Total Obligations',
  },
  [Category.MINORITY_OWNED]: {
    count: 'Minority Owned',
    obligations: 'Minority Owned Obligations',
    totalObligations: 'Minority Owned Total Obligations',
  },
  [Category.EDUCATIONAL]: {
    count: 'Educational Institutions',
    obligations: 'Educational Institutions Obligations',
    totalObligations: 'Educational Institutions Total Obligations',
  },
  [Category.STATE_UNIVERSITY]: {
    count: 'Public Universities',
    obligations: 'Public University Obligations',
    totalObligations: 'Public Universities Total Obligations',
  },
  [Category.HBCU]: {
    count: 'HBCUs',
    obligations: 'HBCU Obligations',
    totalObligations: 'HBCUs Total Obligations',
  },
  [Category.NON_PROFIT]: {
    count: 'Non Profits',
    obligations: 'Non Profit Obligations',
    totalObligations: 'Non Profit Total Obligations',
  },
  [Category.GRANT]: {
    count: 'Grant Recipient Institutions',
    obligations: 'Grant Obligations',
    totalObligations: 'Grant Total Obligations',
  },
};

/**
 * "$1234", "$-45". Truncates toward zero, no thousands separators.
 */
export const formatCurrency = (value: Decimal): string =>
  `$${value.toDecimalPlaces(0, Decimal.ROUND_DOWN).toFixed(0)}`;

const tallyCells = (tally: TallySummary | undefined): string[] => [
  String(tally?.recipients ?? 0),
  formatCurrency(tally?.obligations ?? new Decimal(0)),
];

const toLine = (cells: readonly string[]): string => cells.join(SEPARATOR) + NEWLINE;

// ─────────────────────────────────────────────────────────────────────────────
// Raw dump
// ─────────────────────────────────────────────────────────────────────────────

export const formatRawDump = (header: string | null, rows: readonly string[]): string => {
  const lines: string[] = [];
  if (header !== null) {
    lines.push(toLine(['State', 'District', header]));
  }
  for (const row of rows) {
    lines.push(row + NEWLINE);
  }
  return lines.join('');
};

export const formatDumpRow = (stateCode: string, district: string, line: string): string =>
  [stateCode, district, line].join(SEPARATOR);

// ─────────────────────────────────────────────────────────────────────────────
// Per-year state summary
// ─────────────────────────────────────────────────────────────────────────────

export const STATE_SUMMARY_HEADER: readonly string[] = [
  'State',
  'Total Recipients',
  'Net Obligations',
  ...CATEGORY_ORDER.flatMap((category) => [
    CATEGORY_COLUMNS[category].count,
    CATEGORY_COLUMNS[category].obligations,
  ]),
];

export const formatStateSummaryRow = (row: StateSummaryRow): string[] => [
  row.stateCode,
  String(row.summary.all.recipients),
  formatCurrency(row.summary.all.obligations),
  ...CATEGORY_ORDER.flatMap((category) => tallyCells(row.summary.categories.get(category))),
];

export const formatStateSummaries = (rows: readonly StateSummaryRow[]): string =>
  [STATE_SUMMARY_HEADER, ...rows.map(formatStateSummaryRow)].map(toLine).join('');

// ─────────────────────────────────────────────────────────────────────────────
// Cumulative totals
// ─────────────────────────────────────────────────────────────────────────────

const totalsCategories = (summary: ScopeSummary): Category[] =>
  CATEGORY_ORDER.filter((category) => summary.categories.has(category));

export const totalsHeader = (summary: ScopeSummary): string[] => [
  'Total Recipients',
  'Net Obligations',
  ...totalsCategories(summary).flatMap((category) => [
    CATEGORY_COLUMNS[category].count,
    CATEGORY_COLUMNS[category].totalObligations,
  ]),
];

/**
 * Header plus one row. Columns follow the categories the scope tracked, so a
 * grand-total scope carries no non-profit columns.
 */
export const formatScopeTotals = (summary: ScopeSummary): string =>
  [
    totalsHeader(summary),
    [
      String(summary.all.recipients),
      formatCurrency(summary.all.obligations),
      ...totalsCategories(summary).flatMap((category) =>
        tallyCells(summary.categories.get(category))
      ),
    ],
  ]
    .map(toLine)
    .join('');
