/**
 * Prediction response parsing.
 *
 * The serving endpoint answers with rows of outputs: `{"predictions": [[152.5]]}`.
 * Single-output models often flatten the row to `{"predictions": [152.5]}`, and some
 * gateways drop the envelope. All of these are accepted as long as there is exactly
 * one row with exactly one finite number in it.
 */

import { z } from 'zod';
import { ParseError, truncate } from '../errors.js';

const cell = z.number().finite();

const row = z.union([cell, z.array(cell).length(1)]);

const rows = z.array(row).length(1);

const envelope = z.union([z.object({ predictions: rows }), rows]);

export function parsePrediction(body: unknown): number {
  const parsed = envelope.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(
      `Unexpected response from model endpoint: expected one row with one numeric prediction, got ${preview(body)}`
    );
  }

  const predictions = Array.isArray(parsed.data) ? parsed.data : parsed.data.predictions;
  const [first] = predictions;
  return Array.isArray(first) ? first[0] : first;
}

/**
 * Parse the raw response text. Empty and non-JSON bodies are parse failures, not transport ones.
 */
export function parsePredictionText(text: string): number {
  if (!text.trim()) {
    throw new ParseError('Model endpoint returned an empty response');
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ParseError(`Model endpoint returned invalid JSON: ${truncate(text)}`);
  }

  return parsePrediction(body);
}

function preview(value: unknown): string {
  return truncate(JSON.stringify(value) ?? String(value));
}
