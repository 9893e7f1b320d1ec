import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createParseError, type ParseError } from './errors.js';

const NON_DIGITS = /\D+/g;

/**
 * Parses an obligation token such as "$1,234" or "-$45" into a signed integer.
 *
 * A minus anywhere in the token makes the value negative. Every non-digit is
 * stripped, including decimal points, so "$1,234.00" yields 123400.
 */
export const parseObligationAmount = (raw: string): Result<Decimal, ParseError> => {
  const negative = raw.includes('-');
  const digits = raw.replace(NON_DIGITS, '');

  if (digits === '') {
    return err(createParseError('amount', raw, `Obligation amount '${raw}' contains no digits`));
  }

  const value = new Decimal(digits);
  return ok(negative && !value.isZero() ? value.neg() : value);
};
