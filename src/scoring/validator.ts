/**
 * Input Validator
 * Turns an untrusted request body into a FeatureVector in canonical order
 */

import { z } from 'zod';
import { FEATURE_NAMES, type FeatureName, type FeatureVector } from '../types/index.js';
import { ValidationError } from '../errors.js';

export type ValidationResult =
  | { ok: true; vector: FeatureVector }
  | { ok: false; error: ValidationError };

// ============================================
// Schemas
// ============================================

const NOT_FINITE = 'must be a finite number';

/** Form inputs arrive as text */
const numericText = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number);

// z.number() rejects NaN outright; z.nan() lets it through to the finite check
const featureValue = z
  .union([z.number(), z.nan(), numericText])
  .refine(Number.isFinite, { message: NOT_FINITE });

// No range check: inputs are already normalized by the form
const featuresSchema = z
  .object({
    age: featureValue,
    sex: featureValue,
    bmi: featureValue,
    bp: featureValue,
    s1: featureValue,
    s2: featureValue,
    s3: featureValue,
    s4: featureValue,
    s5: featureValue,
    s6: featureValue,
  })
  .readonly();

const bodySchema = z.record(z.unknown()).refine((body) => Object.keys(body).length > 0);

// ============================================
// Validation
// ============================================

function fail(message: string, fields: string[] = []): ValidationResult {
  return { ok: false, error: new ValidationError(message, fields) };
}

export function validateFeatures(input: unknown): ValidationResult {
  const body = bodySchema.safeParse(input);
  if (!body.success) {
    return fail('No data provided in request body');
  }

  const parsed = featuresSchema.safeParse(body.data);
  if (!parsed.success) {
    return describeIssues(body.data, parsed.error.issues);
  }

  const byName = parsed.data;
  return {
    ok: true,
    vector: Object.freeze({
      values: Object.freeze(FEATURE_NAMES.map((name) => byName[name])),
      byName,
    }),
  };
}

/**
 * Missing fields are reported together; otherwise the first invalid field in canonical order
 */
function describeIssues(body: Record<string, unknown>, issues: z.ZodIssue[]): ValidationResult {
  const messagesByField = new Map<FeatureName, string[]>();
  for (const name of FEATURE_NAMES) {
    const messages = issues.filter((issue) => issue.path[0] === name).map((issue) => issue.message);
    if (messages.length > 0) {
      messagesByField.set(name, messages);
    }
  }

  const rejected = FEATURE_NAMES.filter((name) => messagesByField.has(name));

  const missing = rejected.filter((name) => body[name] === undefined || body[name] === null);
  if (missing.length > 0) {
    return fail(`Missing required features: ${missing.join(', ')}`, missing);
  }

  const [name] = rejected;
  const messages = messagesByField.get(name) ?? [];
  // A non-numeric string also trips the finite check, so "not a number" wins
  const reason = messages.every((message) => message === NOT_FINITE) ? NOT_FINITE : 'must be a number';
  return fail(`Invalid value for feature '${name}': ${reason}`, [name]);
}
