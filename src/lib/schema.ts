/**
 * JSON Schema validation utilities using Ajv.
 */

import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export type ValidationResult<T> = { valid: true; data: T; errors: [] } | { valid: false; data: null; errors: string[] };

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read, parsed or is not an object
 */
export async function loadSchema(schemaPath: string): Promise<SchemaObject> {
  let parsed: unknown;
  try {
    const content = await readFile(schemaPath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isSchemaObject(parsed)) {
    throw new Error(`Failed to load schema from ${schemaPath}: schema is not an object`);
  }
  return parsed;
}

/**
 * Formats Ajv errors as "<path>: <message>" lines.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error) => {
    const path = error.instancePath || '/';
    return `${path}: ${error.message ?? 'validation error'}`;
  });
}

/**
 * Compiles a schema with a fresh Ajv instance, so the same `$id` can be
 * compiled again after the file changes.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  const ajv = new Ajv({
    strict: true,
    allErrors: true,
  });
  return ajv.compile<T>(schema);
}

/**
 * Validates data against a JSON schema.
 */
export function validateWithSchema<T>(data: unknown, schema: SchemaObject): ValidationResult<T> {
  const validate = compileSchema<T>(schema);
  if (validate(data)) {
    return { valid: true, data, errors: [] };
  }
  return { valid: false, data: null, errors: formatSchemaErrors(validate.errors) };
}
