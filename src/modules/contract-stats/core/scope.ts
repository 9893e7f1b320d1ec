import { Decimal } from 'decimal.js';

import {
  ALL_RECIPIENTS,
  Category,
  type AggregationScope,
  type ClassifiedRecord,
  type ScopeKind,
  type ScopeSummary,
  type Tally,
  type TallyKey,
  type TallySummary,
} from './types.js';

/**
 * Fixed column order of the category breakdown in every summary.
 */
export const CATEGORY_ORDER: readonly Category[] = [
  Category.SMALL_BUSINESS,
  Category.WOMAN_OWNED,
  Category.MINORITY_OWNED,
  Category.EDUCATIONAL,
  Category.STATE_UNIVERSITY,
  Category.HBCU,
  Category.NON_PROFIT,
  Category.GRANT,
];

/**
 * Non-profit totals are only reported per state and year.
 */
const CUMULATIVE_CATEGORIES = CATEGORY_ORDER.filter(
  (category) => category !== Category.NON_PROFIT
);

const trackedCategories = (kind: ScopeKind): ReadonlySet<Category> =>
  new Set(kind === 'state-year' ? CATEGORY_ORDER : CUMULATIVE_CATEGORIES);

const emptyTally = (): Tally => ({ names: new Set(), obligations: new Decimal(0) });

export const openScope = (kind: ScopeKind): AggregationScope => {
  const tracked = trackedCategories(kind);
  const tallies = new Map<TallyKey, Tally>([[ALL_RECIPIENTS, emptyTally()]]);

  for (const category of tracked) {
    tallies.set(category, emptyTally());
  }

  return { kind, tracked, tallies };
};

const addToTally = (scope: AggregationScope, key: TallyKey, record: ClassifiedRecord): void => {
  const tally = scope.tallies.get(key);
  if (tally === undefined) {
    return;
  }

  tally.names.add(record.recipientName);
  tally.obligations = tally.obligations.plus(record.obligation);
};

/**
 * Folds one record into every given scope.
 *
 * Names are counted once per category per scope; obligations always accumulate.
 * Categories a scope does not track are ignored for that scope.
 */
export const foldRecord = (record: ClassifiedRecord, scopes: readonly AggregationScope[]): void => {
  for (const scope of scopes) {
    addToTally(scope, ALL_RECIPIENTS, record);

    for (const category of record.categories) {
      if (scope.tracked.has(category)) {
        addToTally(scope, category, record);
      }
    }
  }
};

const summarizeTally = (tally: Tally | undefined): TallySummary =>
  Object.freeze({
    recipients: tally?.names.size ?? 0,
    obligations: tally?.obligations ?? new Decimal(0),
  });

/**
 * Snapshots a scope. Does not mutate it, so closing twice yields equal summaries.
 */
export const closeScope = (scope: AggregationScope): ScopeSummary => {
  const categories = new Map<Category, TallySummary>();

  for (const category of CATEGORY_ORDER) {
    if (scope.tracked.has(category)) {
      categories.set(category, summarizeTally(scope.tallies.get(category)));
    }
  }

  return Object.freeze({
    kind: scope.kind,
    all: summarizeTally(scope.tallies.get(ALL_RECIPIENTS)),
    categories,
  });
};
