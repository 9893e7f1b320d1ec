/**
 * States and territories with a single at-large congressional seat.
 */
export const AT_LARGE_STATES: ReadonlySet<string> = new Set([
  'AK',
  'WY',
  'MT',
  'ND',
  'SD',
  'VT',
  'DE',
]);

const TWO_DIGITS = /^\d{2}$/;

/**
 * Derives a display district label ("CA-12", "AK-00") from the place of
 * performance token. The district number sits in the two characters just
 * before the last two; anything that is not a non-zero two-digit number
 * yields an empty label.
 */
export const resolveDistrict = (stateCode: string, token: string): string => {
  if (AT_LARGE_STATES.has(stateCode)) {
    return `${stateCode}-00`;
  }

  if (token.length < 4) {
    return '';
  }

  const districtNumber = token.slice(-4, -2);
  if (!TWO_DIGITS.test(districtNumber) || Number.parseInt(districtNumber, 10) === 0) {
    return '';
  }

  return `${stateCode}-${districtNumber}`;
};
