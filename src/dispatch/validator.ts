// src/dispatch/validator.ts
import type { JsonValue, ParamSchema, ParamType, ToolInput } from "../types/mcp";

export type ValidationResult =
  | { ok: true }
  | { ok: false; param: string; reason: string };

export const REQUIRED_PARAMETER_MISSING = "required parameter missing";

const article: Record<ParamType, string> = {
  string: "a",
  number: "a",
  integer: "an",
  boolean: "a",
  array: "an",
  object: "an",
};

function matchesType(value: JsonValue, type: ParamType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "integer":
      // 5.0 and 5 are the same JS number, so both pass
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}

/**
 * Shallow, first-error check of `input` against the declared parameters.
 * Keys the schema does not declare are passed through untouched, and array
 * element specs are not checked.
 */
export function validateParameters(input: ToolInput, schema: ParamSchema): ValidationResult {
  for (const [param, spec] of Object.entries(schema)) {
    if (!Object.prototype.hasOwnProperty.call(input, param)) {
      if (spec.required) return { ok: false, param, reason: REQUIRED_PARAMETER_MISSING };
      continue;
    }

    if (!matchesType(input[param], spec.type)) {
      return { ok: false, param, reason: `must be ${article[spec.type]} ${spec.type}` };
    }
  }

  return { ok: true };
}

export function formatValidationFailure(param: string, reason: string): string {
  const detail =
    reason === REQUIRED_PARAMETER_MISSING
      ? `${REQUIRED_PARAMETER_MISSING}: ${param}`
      : `parameter ${param} ${reason}`;
  return `Parameter validation failed: ${detail}`;
}
