import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { closeScope, foldRecord, openScope } from '@/modules/contract-stats/core/scope.js';
import {
  formatCurrency,
  formatDumpRow,
  formatRawDump,
  formatScopeTotals,
  formatStateSummaries,
} from '@/modules/contract-stats/core/summary.js';
import { Category } from '@/modules/contract-stats/core/types.js';

import { makeRecord } from '../../fixtures/builders.js';

const STATE_HEADER =
  'State\tTotal Recipients\tNet Obligations\tSmall Businesses\tSmall Business Obligations\t' +
  'Woman Owned\tWoman Owned Obligations\tMinority Owned\tMinority Owned Obligations\t' +
  'Educational Institutions\tEducational Institutions Obligations\tPublic Universities\t' +
  'Public University Obligations\tHBCUs\tHBCU Obligations\tNon Profits\tNon Profit Obligations\t' +
  'Grant Recipient Institutions\tGrant Obligations\n';

const TOTALS_HEADER =
  'Total Recipients\tNet Obligations\tSmall Businesses\tSmall Business Total Obligations\t' +
  'Woman Owned\tWoman Owned Total Obligations\tMinority Owned\tMinority Owned Total Obligations\t' +
  'Educational Institutions\tEducational Institutions Total Obligations\tPublic Universities\t' +
  'Public Universities Total Obligations\tHBCUs\tHBCUs Total Obligations\t' +
  'Grant Recipient Institutions\tGrant Total Obligations\n';

describe('formatCurrency', () => {
  it('renders integers without separators', () => {
    expect(formatCurrency(new Decimal(1234567))).toBe('$1234567');
  });

  it('renders negative values after the symbol', () => {
    expect(formatCurrency(new Decimal(-45))).toBe('$-45');
  });

  it('truncates fractions instead of rounding', () => {
    expect(formatCurrency(new Decimal('10.9'))).toBe('$10');
    expect(formatCurrency(new Decimal('-10.9'))).toBe('$-10');
  });

  it('does not switch to exponent notation', () => {
    expect(formatCurrency(new Decimal('12345678901234567890'))).toBe(
      '$12345678901234567890'
    );
  });
});

describe('formatStateSummaries', () => {
  it('renders the header alone when no state was processed', () => {
    expect(formatStateSummaries([])).toBe(STATE_HEADER);
  });

  it('renders one row per state in column order', () => {
    const scope = openScope('state-year');
    foldRecord(makeRecord({ obligation: 100, categories: [Category.SMALL_BUSINESS] }), [scope]);
    foldRecord(makeRecord({ obligation: 50, categories: [Category.SMALL_BUSINESS] }), [scope]);
    foldRecord(
      makeRecord({ recipientName: 'HELPING HANDS', obligation: 7, categories: [Category.NON_PROFIT] }),
      [scope]
    );

    const output = formatStateSummaries([{ stateCode: 'CA', summary: closeScope(scope) }]);

    expect(output).toBe(
      STATE_HEADER +
        'CA\t2\t$157\t1\t$150\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t1\t$7\t0\t$0\n'
    );
  });

  it('is pure', () => {
    const scope = openScope('state-year');
    foldRecord(makeRecord({ categories: [Category.HBCU] }), [scope]);
    const rows = [{ stateCode: 'AL', summary: closeScope(scope) }];

    expect(formatStateSummaries(rows)).toBe(formatStateSummaries(rows));
  });
});

describe('formatScopeTotals', () => {
  it('omits non-profit columns for the grand total', () => {
    const scope = openScope('grand-total');
    foldRecord(makeRecord({ obligation: 300, categories: [Category.GRANT, Category.NON_PROFIT] }), [
      scope,
    ]);

    expect(formatScopeTotals(closeScope(scope))).toBe(
      TOTALS_HEADER + '1\t$300\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t1\t$300\n'
    );
  });
});

describe('raw dump', () => {
  it('prefixes the header and rows', () => {
    const rows = [formatDumpRow('CA', 'CA-12', 'ACME\tX'), formatDumpRow('CA', '', 'BETA\tY')];

    expect(formatRawDump('Contractor\tAward', rows)).toBe(
      'State\tDistrict\tContractor\tAward\nCA\tCA-12\tACME\tX\nCA\t\tBETA\tY\n'
    );
  });

  it('writes rows only when no header was captured', () => {
    expect(formatRawDump(null, ['AK\tAK-00\tACME'])).toBe('AK\tAK-00\tACME\n');
  });
});
