import Ajv, { type SchemaObject, type ValidateFunction } from 'ajv';
import tryJsonRepair from '../../utils/jsonRepair.js';

const ajv = new Ajv({ allErrors: true, strict: false });

export interface JsonParseResult {
  parsed: unknown;
  repaired: boolean;
}

function stripFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*\n?/i, '')
    .replace(/\n?```\s*$/i, '')
    .trim();
}

/**
 * Parse model output as JSON, repairing it when a plain parse fails.
 * Returns null when neither works.
 */
export function parseModelJson(raw: string): JsonParseResult | null {
  const cleaned = stripFences(raw);
  try {
    return { parsed: JSON.parse(cleaned), repaired: false };
  } catch {
    const repairedText = tryJsonRepair(cleaned);
    if (!repairedText) return null;
    try {
      return { parsed: JSON.parse(repairedText), repaired: true };
    } catch {
      return null;
    }
  }
}

// Ajv keeps its own cache keyed by schema object
export function compileValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function describeErrors(validator: ValidateFunction): string[] {
  return (validator.errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
}
