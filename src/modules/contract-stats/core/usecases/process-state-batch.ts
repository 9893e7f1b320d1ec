/**
 * Process State Batch Use Case
 *
 * Classifies every data row of one (state, fiscal year) export and folds the
 * records into a fresh state-year scope plus the caller's cumulative scopes.
 */

import { err, ok, type Result } from 'neverthrow';

import { withLine, type ParseError } from '../errors.js';
import { FIELD_SEPARATOR, parseRecordLine } from '../record.js';
import { closeScope, foldRecord, openScope } from '../scope.js';
import { formatDumpRow } from '../summary.js';
import {
  RawColumn,
  type AggregationScope,
  type BatchOutcome,
  type ClassifiedRecord,
  type DescriptionNormalizer,
  type StateRef,
} from '../types.js';

/** Marker the export service returns for a state/year with no data. */
export const INVALID_ENTRY_MARKER = 'Invalid Entry';

/** 1-based line holding the column names. */
export const HEADER_LINE = 7;

export interface ProcessStateBatchInput {
  state: StateRef;
  body: string;
  /** Scopes that outlive the batch (fiscal year, grand total) */
  cumulativeScopes: readonly AggregationScope[];
  normalizeDescription?: DescriptionNormalizer | undefined;
}

const splitLines = (body: string): string[] => {
  const lines = body.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
};

const normalizeDumpLine = (line: string, normalize: DescriptionNormalizer | undefined): string => {
  if (normalize === undefined) {
    return line;
  }

  const fields = line.split(FIELD_SEPARATOR);
  const description = fields[RawColumn.DESCRIPTION];
  if (description === undefined) {
    return line;
  }

  fields[RawColumn.DESCRIPTION] = normalize(description);
  return fields.join(FIELD_SEPARATOR);
};

/**
 * Every row is parsed before anything is folded, so a parse error leaves the
 * cumulative scopes exactly as they were after the previous batch.
 */
export const processStateBatch = (
  input: ProcessStateBatchInput
): Result<BatchOutcome, ParseError> => {
  const { state, body, cumulativeScopes, normalizeDescription } = input;

  if (body.includes(INVALID_ENTRY_MARKER)) {
    return ok({ status: 'skipped', reason: 'InvalidCombination' });
  }

  const lines = splitLines(body);
  const header = lines[HEADER_LINE - 1] ?? null;

  const records: ClassifiedRecord[] = [];
  const dumpRows: string[] = [];

  for (let index = HEADER_LINE; index < lines.length; index++) {
    const line = lines[index] ?? '';
    const parsed = parseRecordLine(line, state);

    if (parsed.isErr()) {
      return err(withLine(parsed.error, index + 1));
    }

    records.push(parsed.value);
    dumpRows.push(
      formatDumpRow(state.code, parsed.value.district, normalizeDumpLine(line, normalizeDescription))
    );
  }

  const stateScope = openScope('state-year');
  const scopes = [stateScope, ...cumulativeScopes];

  for (const record of records) {
    foldRecord(record, scopes);
  }

  return ok({
    status: 'processed',
    header,
    dumpRows,
    summary: closeScope(stateScope),
  });
};
