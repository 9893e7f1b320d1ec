import { describe, expect, it } from 'vitest';

import {
  currentFiscalYear,
  fiscalYearWindow,
  parseFiscalYears,
  recentFiscalYears,
} from '@/modules/contract-stats/core/fiscal-year.js';

describe('currentFiscalYear', () => {
  it('rolls over on the first of October', () => {
    expect(currentFiscalYear(new Date('2019-09-30T23:59:59Z'))).toBe(2019);
    expect(currentFiscalYear(new Date('2019-10-01T00:00:00Z'))).toBe(2020);
  });
});

describe('fiscalYearWindow', () => {
  it('spans October to September', () => {
    expect(fiscalYearWindow(2019)).toEqual({
      year: 2019,
      label: 'FY 19',
      code: 'FY19',
      shortYear: '19',
      startDate: '2018-10-01',
      endDate: '2019-09-30',
    });
  });

  it('keeps the leading zero of the short year', () => {
    expect(fiscalYearWindow(2005).label).toBe('FY 05');
  });
});

describe('recentFiscalYears', () => {
  it('returns the current fiscal year and the two before it', () => {
    expect(recentFiscalYears(new Date('2019-11-15T12:00:00Z'))).toEqual([2018, 2019, 2020]);
  });

  it('honours a custom count', () => {
    expect(recentFiscalYears(new Date('2019-03-01T12:00:00Z'), 1)).toEqual([2019]);
  });
});

describe('parseFiscalYears', () => {
  it('expands ranges and sorts distinct years', () => {
    expect(parseFiscalYears(['2019', '2005-2007', '2006'])._unsafeUnwrap()).toEqual([
      2005, 2006, 2007, 2019,
    ]);
  });

  it('rejects tokens that are not years', () => {
    expect(parseFiscalYears(['FY19'])._unsafeUnwrapErr()).toEqual({
      type: 'ValidationError',
      message: "Invalid fiscal year 'FY19': expected YYYY or YYYY-YYYY",
      field: 'fiscalYear',
      value: 'FY19',
    });
  });

  it('rejects reversed ranges', () => {
    expect(parseFiscalYears(['2019-2017'])._unsafeUnwrapErr().message).toBe(
      "Invalid fiscal year range '2019-2017': start is after end"
    );
  });

  it('requires at least one year', () => {
    expect(parseFiscalYears([])._unsafeUnwrapErr().message).toBe(
      'At least one fiscal year is required'
    );
  });
});
