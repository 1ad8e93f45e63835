/**
 * Validation utilities
 * @internal
 */

import type {
  JSONSchema,
  OperationResult,
  ValidationError,
  ValidationResult,
} from '../types/public-api.js';
import { invalid, ok } from './errors.js';

function describeType(input: unknown): string {
  if (input === null) return 'null';
  if (Array.isArray(input)) return 'array';
  return typeof input;
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Validate input against JSON Schema
 * Note: covers the keywords request bodies use here, not the full draft.
 */
export function validateInput(input: unknown, schema: JSONSchema): ValidationResult {
  const errors: ValidationError[] = [];

  if (schema.type === 'object') {
    if (!isRecord(input)) {
      errors.push({ path: '', message: `Expected object, got ${describeType(input)}` });
      return { valid: false, errors };
    }

    // Check required fields
    for (const field of schema.required ?? []) {
      if (!(field in input) || input[field] === undefined) {
        errors.push({ path: field, message: `Missing required field: ${field}` });
      }
    }

    // Validate each property
    for (const [key, value] of Object.entries(input)) {
      const propSchema = schema.properties?.[key];
      if (propSchema && value !== undefined) {
        const result = validateInput(value, propSchema);
        for (const err of result.errors ?? []) {
          errors.push({
            path: err.path ? `${key}.${err.path}` : key,
            message: err.message,
          });
        }
      }
    }
  }

  if (schema.type === 'string') {
    if (typeof input !== 'string') {
      errors.push({ path: '', message: `Expected string, got ${describeType(input)}` });
    } else if (schema.minLength !== undefined && input.trim().length < schema.minLength) {
      errors.push({ path: '', message: `Must be at least ${schema.minLength} characters` });
    }
  }

  if (schema.type === 'number' || schema.type === 'integer') {
    if (typeof input !== 'number' || Number.isNaN(input)) {
      errors.push({ path: '', message: `Expected number, got ${describeType(input)}` });
    } else {
      if (schema.type === 'integer' && !Number.isInteger(input)) {
        errors.push({ path: '', message: 'Expected integer' });
      }
      if (schema.minimum !== undefined && input < schema.minimum) {
        errors.push({ path: '', message: `Must be >= ${schema.minimum}` });
      }
      if (schema.maximum !== undefined && input > schema.maximum) {
        errors.push({ path: '', message: `Must be <= ${schema.maximum}` });
      }
    }
  }

  if (schema.type === 'boolean' && typeof input !== 'boolean') {
    errors.push({ path: '', message: `Expected boolean, got ${describeType(input)}` });
  }

  if (schema.type === 'array') {
    if (!Array.isArray(input)) {
      errors.push({ path: '', message: `Expected array, got ${describeType(input)}` });
    } else {
      if (schema.minItems !== undefined && input.length < schema.minItems) {
        errors.push({ path: '', message: `Must contain at least ${schema.minItems} item(s)` });
      }
      if (schema.items) {
        const itemSchema = schema.items;
        input.forEach((item, index) => {
          const result = validateInput(item, itemSchema);
          for (const err of result.errors ?? []) {
            errors.push({
              path: err.path ? `${index}.${err.path}` : String(index),
              message: err.message,
            });
          }
        });
      }
    }
  }

  if (schema.enum && !schema.enum.includes(input)) {
    errors.push({ path: '', message: `Value must be one of: ${schema.enum.join(', ')}` });
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  };
}

/**
 * Render validation errors as one line, e.g. `temperature: Must be <= 300`
 */
function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map(err => (err.path ? `${err.path}: ${err.message}` : err.message))
    .join('; ');
}

/**
 * Validate an object body and hand back its fields as a record.
 * Failures become a VALIDATION_ERROR result carrying the field errors.
 */
export function validateRecord(
  input: unknown,
  schema: JSONSchema
): OperationResult<Record<string, unknown>> {
  const result = validateInput(input, { ...schema, type: 'object' });
  if (!result.valid || !isRecord(input)) {
    const fieldErrors = result.errors ?? [];
    return invalid(formatValidationErrors(fieldErrors), fieldErrors);
  }
  return ok(input);
}

export function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
}

/** The value at `key` when it is an array of strings */
export function optionalStringArray(
  record: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = record[key];
  if (!Array.isArray(value)) return undefined;
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return undefined;
    strings.push(item);
  }
  return strings;
}

export function optionalRecord(
  record: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = record[key];
  return isRecord(value) ? value : undefined;
}
