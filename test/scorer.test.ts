/**
 * Remote Scorer Tests
 *
 * The serving endpoint is replaced by an injected fetch.
 */

import { describe, it, expect, vi } from 'vitest';
import { RemoteScorer } from '../src/scoring/remote-scorer.js';
import { buildScoringPayload } from '../src/scoring/payload.js';
import { parsePrediction, parsePredictionText } from '../src/scoring/response.js';
import { validateFeatures } from '../src/scoring/validator.js';
import { ConfigurationError, ParseError, RemoteRejectionError, TransportError } from '../src/errors.js';
import { loadConfig, type ScoringConfig } from '../src/config/config.js';
import type { FeatureVector } from '../src/types/index.js';

const ENDPOINT = 'https://models.example.test/serving-endpoints/diabetes/invocations';

const scoringConfig: ScoringConfig = {
  endpointUrl: ENDPOINT,
  token: 'test-secret',
  timeoutMs: 1000,
  payloadFormat: 'split',
};

function sampleVector(): FeatureVector {
  const result = validateFeatures({
    age: 0.05,
    sex: 0.05,
    bmi: 0.06,
    bp: 0.02,
    s1: -0.04,
    s2: -0.03,
    s3: 0,
    s4: 0,
    s5: 0,
    s6: -0.03,
  });
  if (!result.ok) throw result.error;
  return result.vector;
}

function respondWith(body: string, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

async function scoreError(fetchImpl: typeof fetch, config: ScoringConfig = scoringConfig): Promise<unknown> {
  const scorer = new RemoteScorer(config, { fetchImpl });
  try {
    await scorer.score(sampleVector());
  } catch (error) {
    return error;
  }
  throw new Error('expected score to fail');
}

describe('buildScoringPayload', () => {
  it('builds a single-row split frame', () => {
    expect(buildScoringPayload(sampleVector(), 'split')).toEqual({
      dataframe_split: {
        columns: ['age', 'sex', 'bmi', 'bp', 's1', 's2', 's3', 's4', 's5', 's6'],
        index: [0],
        data: [[0.05, 0.05, 0.06, 0.02, -0.04, -0.03, 0, 0, 0, -0.03]],
      },
    });
  });

  it('builds a single record keyed by feature name', () => {
    expect(buildScoringPayload(sampleVector(), 'records')).toEqual({
      dataframe_records: [
        { age: 0.05, sex: 0.05, bmi: 0.06, bp: 0.02, s1: -0.04, s2: -0.03, s3: 0, s4: 0, s5: 0, s6: -0.03 },
      ],
    });
  });
});

describe('parsePrediction', () => {
  it('reads one row with one column', () => {
    expect(parsePrediction({ predictions: [[152.5]] })).toBe(152.5);
  });

  it('reads a flattened single-output row', () => {
    expect(parsePrediction({ predictions: [152.5] })).toBe(152.5);
  });

  it('reads a bare nested array', () => {
    expect(parsePrediction([[98.25]])).toBe(98.25);
  });

  it('rejects more than one row', () => {
    expect(() => parsePrediction({ predictions: [[1], [2]] })).toThrow(ParseError);
  });

  it('rejects more than one column', () => {
    expect(() => parsePrediction({ predictions: [[1, 2]] })).toThrow(ParseError);
  });

  it('rejects empty predictions', () => {
    expect(() => parsePrediction({ predictions: [] })).toThrow(ParseError);
    expect(() => parsePrediction({ predictions: [[]] })).toThrow(ParseError);
  });

  it('rejects non-numeric outputs', () => {
    expect(() => parsePrediction({ predictions: [['152.5']] })).toThrow(ParseError);
    expect(() => parsePrediction({ result: 152.5 })).toThrow(ParseError);
  });

  it('describes what was received', () => {
    expect(() => parsePrediction({ result: 1 })).toThrow(
      'Unexpected response from model endpoint: expected one row with one numeric prediction, got {"result":1}'
    );
  });
});

describe('parsePredictionText', () => {
  it('rejects an empty body', () => {
    expect(() => parsePredictionText('  ')).toThrow('Model endpoint returned an empty response');
  });

  it('rejects invalid JSON', () => {
    expect(() => parsePredictionText('<html>oops</html>')).toThrow(
      'Model endpoint returned invalid JSON: <html>oops</html>'
    );
  });
});

describe('RemoteScorer', () => {
  it('returns the prediction from the endpoint', async () => {
    const fetchImpl = respondWith(JSON.stringify({ predictions: [[152.5]] }));
    const scorer = new RemoteScorer(scoringConfig, { fetchImpl });

    await expect(scorer.score(sampleVector())).resolves.toBe(152.5);
  });

  it('posts the payload with bearer auth', async () => {
    const fetchImpl = respondWith(JSON.stringify({ predictions: [[152.5]] }));
    const scorer = new RemoteScorer(scoringConfig, { fetchImpl });

    await scorer.score(sampleVector());

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      dataframe_split: {
        columns: ['age', 'sex', 'bmi', 'bp', 's1', 's2', 's3', 's4', 's5', 's6'],
        index: [0],
        data: [[0.05, 0.05, 0.06, 0.02, -0.04, -0.03, 0, 0, 0, -0.03]],
      },
    });
  });

  it('uses the configured payload format', async () => {
    const fetchImpl = respondWith(JSON.stringify({ predictions: [42] }));
    const scorer = new RemoteScorer({ ...scoringConfig, payloadFormat: 'records' }, { fetchImpl });

    await expect(scorer.score(sampleVector())).resolves.toBe(42);
    const [, init] = fetchImpl.mock.calls[0];
    expect(Object.keys(JSON.parse(String(init?.body)))).toEqual(['dataframe_records']);
  });

  it('signals a remote rejection with status and body', async () => {
    const error = await scoreError(respondWith('{"error_code":"UNAUTHENTICATED"}', 401));

    expect(error).toBeInstanceOf(RemoteRejectionError);
    if (!(error instanceof RemoteRejectionError)) return;
    expect(error.status).toBe(401);
    expect(error.body).toBe('{"error_code":"UNAUTHENTICATED"}');
    expect(error.message).toBe('Request failed with status 401. Response: {"error_code":"UNAUTHENTICATED"}');
  });

  it('redacts the token if the endpoint echoes it', async () => {
    const error = await scoreError(respondWith('Invalid token: test-secret', 403));

    expect(error).toBeInstanceOf(RemoteRejectionError);
    if (!(error instanceof RemoteRejectionError)) return;
    expect(error.message).toBe('Request failed with status 403. Response: Invalid token: ***');
  });

  it('truncates a long rejection body', async () => {
    const error = await scoreError(respondWith('x'.repeat(1000), 502));

    expect(error).toBeInstanceOf(RemoteRejectionError);
    if (!(error instanceof RemoteRejectionError)) return;
    expect(error.body).toBe(`${'x'.repeat(200)}...`);
    expect(error.message).toBe(`Request failed with status 502. Response: ${'x'.repeat(200)}...`);
  });

  it('signals a parse failure for a malformed success body', async () => {
    const error = await scoreError(respondWith(''));

    expect(error).toBeInstanceOf(ParseError);
    if (!(error instanceof Error)) return;
    expect(error.message).toBe('Model endpoint returned an empty response');
  });

  it('signals a transport failure when the connection fails', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed', { cause });
    });

    const error = await scoreError(fetchImpl);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.timedOut).toBe(false);
    expect(error.message).toBe('Failed to connect to the model endpoint: fetch failed (connect ECONNREFUSED 127.0.0.1:443)');
    expect(error.httpStatus).toBe(500);
  });

  it('aborts after the configured timeout', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    const error = await scoreError(fetchImpl, { ...scoringConfig, timeoutMs: 20 });

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.timedOut).toBe(true);
    expect(error.message).toBe(
      'Request timed out after 0.02 seconds. The model endpoint may be slow or unavailable.'
    );
  });

  it('waits for a slow answer under the longest configured timeout', async () => {
    const config = loadConfig({
      MLFLOW_ENDPOINT_URL: ENDPOINT,
      DATABRICKS_TOKEN: 'test-secret',
      REQUEST_TIMEOUT: '2147483',
    });
    const fetchImpl = vi.fn<typeof fetch>(
      () =>
        new Promise<Response>((resolve) => {
          setTimeout(() => resolve(new Response(JSON.stringify({ predictions: [[152.5]] }))), 50);
        })
    );
    const scorer = new RemoteScorer(config.scoring, { fetchImpl });

    await expect(scorer.score(sampleVector())).resolves.toBe(152.5);
  });

  it('refuses a timeout a timer cannot hold', () => {
    expect(() => new RemoteScorer({ ...scoringConfig, timeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => new RemoteScorer({ ...scoringConfig, timeoutMs: 3_000_000_000 })).toThrow(
      'Request timeout of 3000000000ms is invalid: must be at most 2147483 seconds.'
    );
  });

  it('makes a single attempt per call', async () => {
    const fetchImpl = respondWith('busy', 503);

    await scoreError(fetchImpl);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
