/**
 * Remote Scorer
 * Sends one feature vector to the MLflow serving endpoint and returns the prediction.
 * One attempt per call, bounded by the configured timeout.
 */

import { timeoutMsSchema, type ScoringConfig } from '../config/config.js';
import type { FeatureVector } from '../types/index.js';
import {
  ConfigurationError,
  RemoteRejectionError,
  TransportError,
  describeError,
  redactSecret,
  truncate,
} from '../errors.js';
import { buildScoringPayload } from './payload.js';
import { parsePredictionText } from './response.js';

// ============================================
// Types
// ============================================

type FetchImpl = typeof globalThis.fetch;

export interface RemoteScorerOptions {
  /** Substitute for the global fetch (tests, proxies) */
  fetchImpl?: FetchImpl;
}

export interface Scorer {
  score(vector: FeatureVector): Promise<number>;
}

// ============================================
// Remote Scorer
// ============================================

export class RemoteScorer implements Scorer {
  private readonly config: ScoringConfig;
  private readonly fetchImpl: FetchImpl;

  constructor(config: ScoringConfig, options: RemoteScorerOptions = {}) {
    const timeout = timeoutMsSchema.safeParse(config.timeoutMs);
    if (!timeout.success) {
      throw new ConfigurationError(
        timeout.error.issues.map((issue) => `Request timeout of ${config.timeoutMs}ms is invalid: ${issue.message}.`)
      );
    }

    this.config = config;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
  }

  async score(vector: FeatureVector): Promise<number> {
    const { endpointUrl, token, timeoutMs, payloadFormat } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(endpointUrl, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${token}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(buildScoringPayload(vector, payloadFormat)),
          signal: controller.signal,
        });
      } catch (error) {
        throw this.transportError(error, controller.signal.aborted);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw this.transportError(error, controller.signal.aborted);
      }

      if (!response.ok) {
        // Gateways answer with whole HTML pages
        throw new RemoteRejectionError(response.status, truncate(redactSecret(text, token)));
      }

      return parsePredictionText(text);
    } finally {
      clearTimeout(timer);
    }
  }

  private transportError(error: unknown, timedOut: boolean): TransportError {
    if (timedOut) {
      const seconds = this.config.timeoutMs / 1000;
      return new TransportError(
        `Request timed out after ${seconds} seconds. The model endpoint may be slow or unavailable.`,
        error,
        true
      );
    }

    return new TransportError(
      `Failed to connect to the model endpoint: ${redactSecret(describeCause(error), this.config.token)}`,
      error
    );
  }
}

/**
 * undici wraps the socket error: "fetch failed" with the useful part in `cause`
 */
function describeCause(error: unknown): string {
  const message = describeError(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${describeError(error.cause)})`;
  }
  return message;
}
