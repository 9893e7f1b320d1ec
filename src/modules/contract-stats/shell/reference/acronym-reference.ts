import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors, type ReferenceDataError } from '../../core/errors.js';

import type { AcronymEntry } from '../../core/types.js';

const AcronymRowsSchema = Type.Array(
  Type.Object({
    Acronym: Type.Optional(Type.String()),
    Definition: Type.Optional(Type.String()),
  })
);

const validator = TypeCompiler.Compile(AcronymRowsSchema);

/**
 * Reads an acronym reference CSV with "Acronym" and "Definition" columns.
 * Rows with neither value are dropped.
 */
export const loadAcronyms = async (
  filePath: string
): Promise<Result<AcronymEntry[], ReferenceDataError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({ type: 'NotFound', message: `Acronym reference not found at ${filePath}` });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read acronym reference at ${filePath}: ${(error as Error).message}`,
    });
  }

  let rows: unknown;
  try {
    rows = parse(contents, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(rows)) {
    return err({
      type: 'SchemaValidationError',
      message: `Unexpected columns in ${filePath}`,
      details: formatSchemaErrors(validator.Errors(rows)),
    });
  }

  return ok(
    rows
      .map((row) => ({
        acronym: row.Acronym ?? '',
        definition: row.Definition ?? '',
      }))
      .filter((entry) => entry.acronym !== '' || entry.definition !== '')
  );
};
