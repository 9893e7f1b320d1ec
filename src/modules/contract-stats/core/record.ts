import { err, ok, type Result } from 'neverthrow';

import { parseObligationAmount } from './amount.js';
import { classifyRecipient } from './classifier.js';
import { resolveDistrict } from './district.js';
import { createParseError, type ParseError } from './errors.js';
import { MIN_RAW_FIELDS, RawColumn, type ClassifiedRecord, type StateRef } from './types.js';

export const FIELD_SEPARATOR = '\t';

/**
 * Turns one tab-separated export row into a classified record.
 */
export const parseRecordLine = (
  line: string,
  state: StateRef
): Result<ClassifiedRecord, ParseError> => {
  const fields = line.split(FIELD_SEPARATOR);

  if (fields.length < MIN_RAW_FIELDS) {
    return err(
      createParseError(
        'row',
        line,
        `Expected at least ${String(MIN_RAW_FIELDS)} fields, got ${String(fields.length)}`
      )
    );
  }

  const recipientName = fields[RawColumn.RECIPIENT] ?? '';
  const placeOfPerformance = fields[RawColumn.PLACE_OF_PERFORMANCE] ?? '';
  const awardType = fields[RawColumn.AWARD_TYPE] ?? '';
  const indicators = fields[RawColumn.INDICATORS] ?? '';
  const rawAmount = fields[RawColumn.OBLIGATION] ?? '';

  const amountResult = parseObligationAmount(rawAmount);
  if (amountResult.isErr()) {
    return err(amountResult.error);
  }

  return ok(
    Object.freeze({
      recipientName,
      district: resolveDistrict(state.code, placeOfPerformance),
      obligation: amountResult.value,
      categories: classifyRecipient({
        descriptors: `${awardType} ${indicators}`,
        recipientName,
        stateName: state.name,
      }),
    })
  );
};
