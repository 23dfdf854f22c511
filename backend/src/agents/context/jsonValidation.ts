import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import tryJsonRepair from '../../utils/jsonRepair.js';

// ajv ships CommonJS; under ESM the class sits on `.default`
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
const schemaCache = new WeakMap<SchemaObject, ValidateFunction>();

export interface JsonValidationResult {
  valid: boolean;
  parsed: unknown;
  errors?: string[];
  repaired?: boolean;
}

function compileSchema(schema: SchemaObject): ValidateFunction {
  const cached = schemaCache.get(schema);
  if (cached) return cached;
  const validator = ajv.compile(schema);
  schemaCache.set(schema, validator);
  return validator;
}

/** Strip Markdown code fences and <thinking> blocks around a model reply. */
export function stripResponseWrappers(response: string): string {
  return response
    .trim()
    .replace(/^```(?:json)?\s*\n?/i, '')
    .replace(/\n?```\s*$/i, '')
    .replace(/<thinking>[\s\S]*?<\/thinking>/gi, '')
    .trim();
}

function unwrapResult(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return parsed;
  const keys = Object.keys(parsed);
  if (keys.length !== 1 || keys[0] !== 'result') return parsed;
  const inner: unknown = Reflect.get(parsed, 'result');
  if (typeof inner !== 'string') return inner;
  try {
    return JSON.parse(inner);
  } catch {
    // A plain string result is not the object we want
    return inner;
  }
}

/**
 * Decode model output as JSON (repairing near-JSON when needed) and check it
 * against `schema`. A single `{ "result": ... }` wrapper is unwrapped first.
 */
export function validateJson(raw: string, schema: SchemaObject): JsonValidationResult {
  const cleaned = stripResponseWrappers(raw);
  if (!cleaned) {
    return { valid: false, parsed: null, errors: ['empty_output'], repaired: false };
  }

  let parsed: unknown = null;
  let repaired = false;

  try {
    parsed = JSON.parse(cleaned);
  } catch {
    const repairedText = tryJsonRepair(cleaned);
    if (!repairedText) {
      return { valid: false, parsed: null, errors: ['parse_failed'], repaired: false };
    }
    try {
      parsed = JSON.parse(repairedText);
      repaired = true;
    } catch {
      return { valid: false, parsed: null, errors: ['parse_failed'], repaired: true };
    }
  }

  parsed = unwrapResult(parsed);
  const validator = compileSchema(schema);
  if (validator(parsed)) return { valid: true, parsed, repaired };
  return { valid: false, parsed, errors: describeErrors(validator), repaired };
}

/** Compile a schema whose validator doubles as a type guard for `T`. */
export function compileValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function describeErrors(validator: ValidateFunction): string[] {
  return (validator.errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
}
