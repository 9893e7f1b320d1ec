import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '@/cli/args.js';

describe('parseCliArgs', () => {
  it('returns defaults without arguments', () => {
    expect(parseCliArgs([])._unsafeUnwrap()).toEqual({
      kind: 'run',
      options: { fiscalYears: undefined, outputDir: undefined, states: [], onParseError: 'abort' },
    });
  });

  it('collects years and ranges after -fy', () => {
    const command = parseCliArgs(['-fy', '2019', '2017-2018', '-dir', 'out'])._unsafeUnwrap();

    expect(command).toEqual({
      kind: 'run',
      options: {
        fiscalYears: [2017, 2018, 2019],
        outputDir: 'out',
        states: [],
        onParseError: 'abort',
      },
    });
  });

  it('accepts long option names', () => {
    const command = parseCliArgs([
      '--fiscal-year',
      '2015',
      '--output-dir',
      'exports',
      '--states',
      'ca, tx,',
      '--on-parse-error',
      'skip-state',
    ])._unsafeUnwrap();

    expect(command).toEqual({
      kind: 'run',
      options: {
        fiscalYears: [2015],
        outputDir: 'exports',
        states: ['ca', 'tx'],
        onParseError: 'skip-state',
      },
    });
  });

  it('returns help for -h and --help', () => {
    expect(parseCliArgs(['-h'])._unsafeUnwrap()).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-fy', '2019', '--help'])._unsafeUnwrap()).toEqual({ kind: 'help' });
  });

  it('requires a year after -fy', () => {
    expect(parseCliArgs(['-fy'])._unsafeUnwrapErr().message).toBe(
      '-fy requires at least one year'
    );
    expect(parseCliArgs(['-fy', '-dir', 'out'])._unsafeUnwrapErr().message).toBe(
      '-fy requires at least one year'
    );
  });

  it('requires a value after -dir', () => {
    expect(parseCliArgs(['-dir'])._unsafeUnwrapErr().message).toBe('-dir requires a directory');
  });

  it('rejects an unknown parse error policy', () => {
    expect(parseCliArgs(['--on-parse-error', 'ignore'])._unsafeUnwrapErr()).toEqual({
      type: 'ValidationError',
      message: "--on-parse-error must be 'abort' or 'skip-state'",
      field: 'onParseError',
      value: 'ignore',
    });
  });

  it('rejects unknown arguments', () => {
    expect(parseCliArgs(['--verbose'])._unsafeUnwrapErr().message).toBe(
      "Unknown argument '--verbose'"
    );
  });

  it('reports invalid years', () => {
    expect(parseCliArgs(['-fy', '19'])._unsafeUnwrapErr().message).toBe(
      "Invalid fiscal year '19': expected YYYY or YYYY-YYYY"
    );
  });
});
