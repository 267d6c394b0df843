import { z } from "zod";
import { ValidationError } from "../domain/errors.js";

export interface StringRules {
  minLength?: number;
  maxLength?: number;
  allowEmpty?: boolean;
}

const BATCH_ID_PATTERN = /^\d{8}-\d{3}$/;
const SLUG_PATTERN = /^[a-z0-9-]+$/;
const QUERY_DISALLOWED = /[^\p{L}\p{N}_\s\-.,!?'"]+/gu;

export function validateString(
  value: unknown,
  fieldName: string,
  rules: StringRules = {},
): string {
  const { minLength = 1, maxLength = 500, allowEmpty = false } = rules;

  const schema = z
    .string({
      required_error: `${fieldName} is required`,
      invalid_type_error: `${fieldName} must be a string, got ${describeType(value)}`,
    })
    .trim()
    .superRefine((text, ctx) => {
      if (text.length === 0) {
        if (!allowEmpty) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${fieldName} cannot be empty` });
        }
        return;
      }
      if (text.length < minLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${fieldName} must be at least ${minLength} characters, got ${text.length}`,
        });
      }
      if (text.length > maxLength) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${fieldName} must be at most ${maxLength} characters, got ${text.length}`,
        });
      }
    });

  return parseOrThrow(schema, value);
}

export function validateInteger(
  value: unknown,
  fieldName: string,
  bounds: { min?: number; max?: number } = {},
): number {
  let schema = z
    .number({
      required_error: `${fieldName} is required`,
      invalid_type_error: `${fieldName} must be an integer, got ${describeType(value)}`,
    })
    .int(`${fieldName} must be an integer, got ${String(value)}`);

  if (bounds.min !== undefined) {
    schema = schema.min(bounds.min, `${fieldName} must be at least ${bounds.min}, got ${String(value)}`);
  }
  if (bounds.max !== undefined) {
    schema = schema.max(bounds.max, `${fieldName} must be at most ${bounds.max}, got ${String(value)}`);
  }

  return parseOrThrow(schema, value);
}

export function validateLimit(limit: unknown): number {
  return validateInteger(limit, "limit", { min: 1, max: 1000 });
}

export function validateThreshold(threshold: unknown, fieldName = "threshold"): number {
  const schema = z
    .number({ invalid_type_error: `${fieldName} must be a number, got ${describeType(threshold)}` })
    .min(0, `${fieldName} must be between 0 and 1, got ${String(threshold)}`)
    .max(1, `${fieldName} must be between 0 and 1, got ${String(threshold)}`);
  return parseOrThrow(schema, threshold);
}

export function validateBatchId(batchId: unknown): string {
  const value = validateString(batchId, "batch_id", { minLength: 12, maxLength: 12 });
  if (!BATCH_ID_PATTERN.test(value)) {
    throw new ValidationError(`batch_id must match format YYYYMMDD-NNN, got '${value}'`);
  }
  return value;
}

export function validateSlug(slug: unknown, fieldName = "slug"): string {
  const value = validateString(slug, fieldName, { minLength: 1, maxLength: 200 });
  if (!SLUG_PATTERN.test(value)) {
    throw new ValidationError(`${fieldName} must contain only lowercase letters, numbers, and hyphens`);
  }
  if (value.startsWith("-") || value.endsWith("-")) {
    throw new ValidationError(`${fieldName} cannot start or end with a hyphen`);
  }
  return value;
}

/**
 * Trims the query and strips characters outside word characters, whitespace
 * and basic punctuation.
 */
export function sanitizeSearchQuery(query: unknown): string {
  if (query === null || query === undefined || (typeof query === "string" && !query.trim())) {
    throw new ValidationError("Search query cannot be empty");
  }
  const value = validateString(query, "search query", { minLength: 1, maxLength: 1000 });
  return value.replace(QUERY_DISALLOWED, "");
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? "invalid value");
  }
  return result.data;
}

function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}
