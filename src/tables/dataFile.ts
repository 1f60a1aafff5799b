import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { ConfigurationError } from '../errors.js';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Reads one of the JSON tables under `data/` and validates it. Tables are
 * read once per process by their accessors and never written.
 */
export function loadDataFile<Schema extends z.ZodTypeAny>(filename: string, schema: Schema): z.output<Schema> {
  const location = new URL(filename, DATA_DIR);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(location, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read data table ${filename}.`, { cause: error });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Data table ${filename} is invalid: ${result.error.message}`);
  }
  return result.data;
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
