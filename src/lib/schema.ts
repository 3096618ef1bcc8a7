/**
 * JSON Schema validation utilities using Ajv.
 *
 * The config file, the backend selection record and the artifact manifests are
 * all validated against the schemas shipped in `schemas/`.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { bundledSchemaPath } from './paths.js';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

/** Schema files bundled with the package. */
export type BundledSchema =
  | 'stackctl.config.schema.json'
  | 'backend-selection.schema.json'
  | 'backup-manifest.schema.json';

const schemaCache = new Map<string, ValidateFunction>();
const loadedSchemas = new Map<string, object>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  const cached = loadedSchemas.get(schemaPath);
  if (cached) return cached;
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const schema: object = JSON.parse(content);
    loadedSchemas.set(schemaPath, schema);
    return schema;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Validates data against a JSON schema using Ajv. Compiled schemas are cached
 * by `$id` (or by their serialized form).
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };

  const schemaId = ('$id' in schema && typeof schema.$id === 'string') ? schema.$id : JSON.stringify(schema);
  let validate = schemaCache.get(schemaId);
  if (!validate) {
    validate = new Ajv({ strict: true, allErrors: true }).compile(schema);
    schemaCache.set(schemaId, validate);
  }

  if (validate(data)) {
    return { valid: true, data: data as T, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    return `${path ? `${path}: ` : ''}${error.message || 'Validation error'}`;
  });

  return { valid: false, data: null, errors };
}

/**
 * Validates data against one of the bundled schemas.
 */
export async function validateBundled<T>(data: unknown, schema: BundledSchema): Promise<ValidationResult<T>> {
  return validateWithSchema<T>(data, await loadSchema(bundledSchemaPath(schema)));
}
