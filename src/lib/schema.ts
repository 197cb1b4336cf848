/**
 * JSON Schema validation utilities using Ajv.
 *
 * Provides functions to load and validate data against JSON schemas.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> =
  | { valid: true; data: T; errors: [] }
  | { valid: false; data: null; errors: string[] };

/** Directory holding the bundled JSON schemas (same relative spot from src/ and dist/). */
export const SCHEMAS_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

export const CONFIG_SCHEMA_PATH = `${SCHEMAS_DIR}rosdeb.config.schema.json`;

// Compiled validators keyed by schema $id (or the stringified schema)
const schemaCache = new Map<string, ValidateFunction>();

// Type assertion needed due to NodeNext module resolution of Ajv's CommonJS default export
const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
  compile: (schema: object) => ValidateFunction;
};

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not a JSON object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function schemaKey(schema: object): string {
  const id: unknown = '$id' in schema ? schema.$id : undefined;
  return typeof id === 'string' ? id : JSON.stringify(schema);
}

function compileSchema(schema: object): ValidateFunction {
  const key = schemaKey(schema);
  const cached = schemaCache.get(key);
  if (cached) {
    return cached;
  }
  const validate = new Ajv({ strict: true, allErrors: true }).compile(schema);
  schemaCache.set(key, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 *
 * The caller's `T` must describe what the schema accepts; the schema is the
 * only check performed.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compileSchema(schema) as ValidateFunction<T>;

  if (validate(data)) {
    return { valid: true, data, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    return `${path ? `${path}: ` : ''}${message}`;
  });

  return { valid: false, data: null, errors };
}
