import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { Category } from '@/modules/contract-stats/core/types.js';
import { runFiscalYears } from '@/modules/contract-stats/core/usecases/run-fiscal-years.js';

import {
  ALASKA,
  CALIFORNIA,
  EXPORT_HEADER,
  TEXAS,
  makeExportBody,
  makeExportRow,
} from '../../fixtures/builders.js';
import { makeFakeExportProvider, makeInMemoryOutputWriter } from '../../fixtures/fakes.js';

const testLogger = pinoLogger({ level: 'silent' });

const TOTALS_HEADER =
  'Total Recipients\tNet Obligations\tSmall Businesses\tSmall Business Total Obligations\t' +
  'Woman Owned\tWoman Owned Total Obligations\tMinority Owned\tMinority Owned Total Obligations\t' +
  'Educational Institutions\tEducational Institutions Total Obligations\tPublic Universities\t' +
  'Public Universities Total Obligations\tHBCUs\tHBCUs Total Obligations\t' +
  'Grant Recipient Institutions\tGrant Total Obligations\n';

const acmeRow = (obligation: string) =>
  makeExportRow({ recipient: 'ACME CORP', indicators: 'Small Business', obligation });

const universityRow = makeExportRow({
  recipient: 'UNIVERSITY OF CALIFORNIA',
  placeOfPerformance: 'BERKELEY CA 947040512',
  indicators: 'Educational Institution',
  obligation: '$40',
});

const nonProfitRow = makeExportRow({
  recipient: 'HELPING HANDS',
  placeOfPerformance: 'ANCHORAGE AK 995010001',
  indicators: 'Nonprofit Organization',
  obligation: '$7',
});

const makeProvider = () =>
  makeFakeExportProvider({
    2018: {
      CA: makeExportBody([acmeRow('$100'), universityRow]),
      TX: { type: 'NetworkError', message: 'socket hang up', retryable: true },
    },
    2019: {
      CA: makeExportBody([acmeRow('$25')]),
      AK: makeExportBody([nonProfitRow]),
    },
  });

const states = [CALIFORNIA, ALASKA, TEXAS];

describe('runFiscalYears', () => {
  it('writes per-year files and the grand total', async () => {
    const provider = makeProvider();
    const writer = makeInMemoryOutputWriter();

    const result = await runFiscalYears(
      { provider, writer, logger: testLogger },
      { fiscalYears: [2018, 2019], states, filePrefix: 'contracts' }
    );

    const report = result._unsafeUnwrap();
    expect(report.files).toEqual([
      'memory/contracts-FY-18-full.tsv',
      'memory/contracts-FY-18-summary.tsv',
      'memory/contracts-FY-18-totals.tsv',
      'memory/contracts-FY-19-full.tsv',
      'memory/contracts-FY-19-summary.tsv',
      'memory/contracts-FY-19-totals.tsv',
      'memory/contracts-FY2018-FY2019-summary.tsv',
    ]);
    expect(provider.requests).toHaveLength(6);

    expect(writer.files.get('contracts-FY2018-FY2019-summary.tsv')).toBe(
      TOTALS_HEADER + '3\t$172\t1\t$125\t0\t$0\t0\t$0\t1\t$40\t1\t$40\t0\t$0\t0\t$0\n'
    );
  });

  it('reports processed, skipped and failed states per year', async () => {
    const result = await runFiscalYears(
      { provider: makeProvider(), writer: makeInMemoryOutputWriter(), logger: testLogger },
      { fiscalYears: [2018, 2019], states, filePrefix: 'contracts' }
    );

    const [fy18, fy19] = result._unsafeUnwrap().years;
    expect(fy18).toMatchObject({
      fiscalYear: 2018,
      processed: ['CA'],
      skipped: ['AK'],
      failed: [{ stateCode: 'TX', errorType: 'NetworkError', message: 'socket hang up' }],
    });
    expect(fy19).toMatchObject({ fiscalYear: 2019, processed: ['CA', 'AK'], skipped: ['TX'] });
    expect(fy19?.totals.all.recipients).toBe(2);
    expect(fy19?.totals.all.obligations.toNumber()).toBe(32);
  });

  it('keeps non-profits out of the grand total but in the state summary', async () => {
    const writer = makeInMemoryOutputWriter();

    const report = (
      await runFiscalYears(
        { provider: makeProvider(), writer, logger: testLogger },
        { fiscalYears: [2018, 2019], states, filePrefix: 'contracts' }
      )
    )._unsafeUnwrap();

    expect(report.grandTotal.categories.has(Category.NON_PROFIT)).toBe(false);
    const summary = writer.files.get('contracts-FY-19-summary.tsv') ?? '';
    expect(summary.split('\n')[2]).toBe(
      'AK\t1\t$7\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t1\t$7\t0\t$0'
    );
  });

  it('writes the raw dump with the header of the first processed state', async () => {
    const writer = makeInMemoryOutputWriter();

    await runFiscalYears(
      { provider: makeProvider(), writer, logger: testLogger },
      { fiscalYears: [2019], states, filePrefix: 'contracts' }
    );

    expect(writer.files.get('contracts-FY-19-full.tsv')).toBe(
      `State\tDistrict\t${EXPORT_HEADER}\n` +
        `CA\tCA-12\t${acmeRow('$25')}\n` +
        `AK\tAK-00\t${nonProfitRow}\n`
    );
  });

  it('writes an empty summary and no raw dump for a year without data', async () => {
    const writer = makeInMemoryOutputWriter();

    const report = (
      await runFiscalYears(
        { provider: makeProvider(), writer, logger: testLogger },
        { fiscalYears: [2017], states, filePrefix: 'contracts' }
      )
    )._unsafeUnwrap();

    expect(writer.files.has('contracts-FY-17-full.tsv')).toBe(false);
    expect(writer.files.get('contracts-FY-17-summary.tsv')?.split('\n')).toHaveLength(2);
    expect(report.years[0]?.skipped).toEqual(['CA', 'AK', 'TX']);
    expect(report.grandTotal.all.recipients).toBe(0);
  });

  describe('parse errors', () => {
    const brokenProvider = () =>
      makeFakeExportProvider({
        2018: { CA: makeExportBody([acmeRow('$100')]) },
        2019: {
          CA: makeExportBody([acmeRow('unknown')]),
          AK: makeExportBody([nonProfitRow]),
        },
      });

    it('aborts the run by default, keeping files of finished years', async () => {
      const writer = makeInMemoryOutputWriter();

      const result = await runFiscalYears(
        { provider: brokenProvider(), writer, logger: testLogger },
        { fiscalYears: [2018, 2019], states, filePrefix: 'contracts' }
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ParseError', line: 8 });
      expect([...writer.files.keys()]).toEqual([
        'contracts-FY-18-full.tsv',
        'contracts-FY-18-summary.tsv',
        'contracts-FY-18-totals.tsv',
      ]);
    });

    it('writes the states closed earlier in the year before aborting', async () => {
      const writer = makeInMemoryOutputWriter();
      const provider = makeFakeExportProvider({
        2019: {
          CA: makeExportBody([acmeRow('$100')]),
          AK: makeExportBody([makeExportRow({ obligation: 'n/a' })]),
        },
      });

      const result = await runFiscalYears(
        { provider, writer, logger: testLogger },
        { fiscalYears: [2019], states, filePrefix: 'contracts' }
      );

      expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ParseError', line: 8 });
      expect([...writer.files.keys()]).toEqual([
        'contracts-FY-19-full.tsv',
        'contracts-FY-19-summary.tsv',
      ]);
      expect(writer.files.get('contracts-FY-19-summary.tsv')?.split('\n')[1]).toBe(
        'CA\t1\t$100\t1\t$100\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0\t0\t$0'
      );
      expect(writer.files.get('contracts-FY-19-full.tsv')).toBe(
        `State\tDistrict\t${EXPORT_HEADER}\nCA\tCA-12\t${acmeRow('$100')}\n`
      );
    });

    it('skips the failing state when asked to', async () => {
      const result = await runFiscalYears(
        { provider: brokenProvider(), writer: makeInMemoryOutputWriter(), logger: testLogger },
        {
          fiscalYears: [2018, 2019],
          states,
          filePrefix: 'contracts',
          onParseError: 'skip-state',
        }
      );

      const report = result._unsafeUnwrap();
      expect(report.years[1]?.processed).toEqual(['AK']);
      expect(report.years[1]?.failed).toEqual([
        {
          stateCode: 'CA',
          errorType: 'ParseError',
          message: "Line 8: Obligation amount 'unknown' contains no digits",
        },
      ]);
      // 2018 ACME plus 2019 HELPING HANDS; the broken CA batch contributed nothing
      expect(report.grandTotal.all.recipients).toBe(2);
      expect(report.grandTotal.all.obligations.toNumber()).toBe(107);
    });
  });

  it('stops on write failures', async () => {
    const writer = makeInMemoryOutputWriter(['contracts-FY-18-summary.tsv']);

    const result = await runFiscalYears(
      { provider: makeProvider(), writer, logger: testLogger },
      { fiscalYears: [2018, 2019], states, filePrefix: 'contracts' }
    );

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'WriteError',
      path: 'memory/contracts-FY-18-summary.tsv',
    });
    expect([...writer.files.keys()]).toEqual(['contracts-FY-18-full.tsv']);
  });
});
