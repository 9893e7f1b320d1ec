import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Categories
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Recipient categories a contract action can be attributed to.
 * A record may belong to several at once (e.g. Educational + StateUniversity + HBCU).
 */
export enum Category {
  SMALL_BUSINESS = 'SMALL_BUSINESS',
  WOMAN_OWNED = 'WOMAN_OWNED',
  MINORITY_OWNED = 'MINORITY_OWNED',
  EDUCATIONAL = 'EDUCATIONAL',
  STATE_UNIVERSITY = 'STATE_UNIVERSITY',
  HBCU = 'HBCU',
  NON_PROFIT = 'NON_PROFIT',
  GRANT = 'GRANT',
}

/**
 * Pseudo-category every folded record counts towards.
 */
export const ALL_RECIPIENTS = 'ALL_RECIPIENTS';

export type TallyKey = Category | typeof ALL_RECIPIENTS;

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export interface StateRef {
  /** Two-letter postal code, e.g. "CA" */
  code: string;
  /** Full name, e.g. "California" */
  name: string;
}

/**
 * Column positions in an export data row.
 */
export const RawColumn = {
  RECIPIENT: 0,
  AWARD_NUMBER: 1,
  PLACE_OF_PERFORMANCE: 3,
  AWARD_TYPE: 6,
  INDICATORS: 7,
  OBLIGATION: 8,
  DESCRIPTION: 14,
} as const;

/** Minimum number of fields a data row needs to be classified. */
export const MIN_RAW_FIELDS = RawColumn.OBLIGATION + 1;

export interface ClassifiedRecord {
  readonly recipientName: string;
  readonly district: string;
  readonly obligation: Decimal;
  readonly categories: ReadonlySet<Category>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Scopes
// ─────────────────────────────────────────────────────────────────────────────

export type ScopeKind = 'state-year' | 'fiscal-year' | 'grand-total';

export interface Tally {
  names: Set<string>;
  obligations: Decimal;
}

/**
 * Mutable accumulator. Owned by whoever opened it and passed explicitly into folds.
 */
export interface AggregationScope {
  readonly kind: ScopeKind;
  readonly tracked: ReadonlySet<Category>;
  readonly tallies: Map<TallyKey, Tally>;
}

export interface TallySummary {
  readonly recipients: number;
  readonly obligations: Decimal;
}

export interface ScopeSummary {
  readonly kind: ScopeKind;
  readonly all: TallySummary;
  /** Only the categories the scope tracks are present. */
  readonly categories: ReadonlyMap<Category, TallySummary>;
}

export interface StateSummaryRow {
  readonly stateCode: string;
  readonly summary: ScopeSummary;
}

// ─────────────────────────────────────────────────────────────────────────────
// Batches and runs
// ─────────────────────────────────────────────────────────────────────────────

export interface FiscalYearWindow {
  year: number;
  /** "FY 19" */
  label: string;
  /** "FY19" */
  code: string;
  /** "19" */
  shortYear: string;
  /** First day, YYYY-MM-DD */
  startDate: string;
  /** Last day, YYYY-MM-DD */
  endDate: string;
}

export interface ExportRequest {
  fiscalYear: number;
  state: StateRef;
}

export type ParseErrorPolicy = 'skip-state' | 'abort';

export interface SkippedBatch {
  status: 'skipped';
  reason: 'InvalidCombination';
}

export interface ProcessedBatch {
  status: 'processed';
  /** Column header line (line 7), when the body has one */
  header: string | null;
  /** Rows prefixed with state code and district, ready for the raw dump */
  dumpRows: string[];
  summary: ScopeSummary;
}

export type BatchOutcome = SkippedBatch | ProcessedBatch;

export interface StateFailure {
  stateCode: string;
  errorType: string;
  message: string;
}

export interface FiscalYearReport {
  fiscalYear: number;
  processed: string[];
  skipped: string[];
  failed: StateFailure[];
  totals: ScopeSummary;
}

export interface RunReport {
  years: FiscalYearReport[];
  files: string[];
  grandTotal: ScopeSummary;
}

export interface AcronymEntry {
  acronym: string;
  definition: string;
}

export type DescriptionNormalizer = (text: string) => string;
