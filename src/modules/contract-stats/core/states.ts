import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from '../../../common/types/errors.js';

import type { StateRef } from './types.js';

/**
 * Restricts the registry to the requested codes, keeping registry order.
 * An empty request selects every state.
 */
export const selectStates = (
  registry: readonly StateRef[],
  codes: readonly string[]
): Result<StateRef[], ValidationError> => {
  if (codes.length === 0) {
    return ok([...registry]);
  }

  const requested = new Set(codes.map((code) => code.trim().toUpperCase()));
  const known = new Set(registry.map((state) => state.code));

  for (const code of requested) {
    if (!known.has(code)) {
      return err(createValidationError(`Unknown state code '${code}'`, 'states', code));
    }
  }

  return ok(registry.filter((state) => requested.has(state.code)));
};
