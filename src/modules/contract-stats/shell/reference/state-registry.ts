import fs from 'node:fs/promises';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors, type ReferenceDataError } from '../../core/errors.js';

import type { StateRef } from '../../core/types.js';

export const StateFileSchema = Type.Array(
  Type.Object({
    code: Type.String({ pattern: '^[A-Z]{2}$' }),
    name: Type.String({ minLength: 1 }),
  }),
  { minItems: 1 }
);

export type StateFileDTO = Static<typeof StateFileSchema>;

const validator = TypeCompiler.Compile(StateFileSchema);

/**
 * Reads the list of states and territories to export, in processing order.
 */
export const loadStates = async (
  filePath: string
): Promise<Result<StateRef[], ReferenceDataError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `State registry not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read state registry at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  return ok(parsed.map((entry) => ({ code: entry.code, name: entry.name })));
};
