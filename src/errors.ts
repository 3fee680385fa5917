/**
 * Error taxonomy for the prediction flow.
 * Every failure a request can hit maps to one of these and to an HTTP status.
 */

export abstract class PredictorError extends Error {
  abstract readonly httpStatus: number;
}

export class ConfigurationError extends PredictorError {
  readonly httpStatus = 500;

  constructor(readonly problems: string[]) {
    super(`Configuration error: ${problems.join(' ')}`);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends PredictorError {
  readonly httpStatus = 400;

  constructor(message: string, readonly fields: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TransportError extends PredictorError {
  readonly httpStatus = 500;

  constructor(message: string, readonly cause: unknown, readonly timedOut = false) {
    super(message);
    this.name = 'TransportError';
  }
}

export class RemoteRejectionError extends PredictorError {
  readonly httpStatus = 500;

  constructor(readonly status: number, readonly body: string) {
    super(`Request failed with status ${status}. Response: ${body}`);
    this.name = 'RemoteRejectionError';
  }
}

export class ParseError extends PredictorError {
  readonly httpStatus = 500;

  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export function errorStatus(error: unknown): number {
  return error instanceof PredictorError ? error.httpStatus : 500;
}

/**
 * Replace every occurrence of the credential in text.
 * Remote services sometimes echo the Authorization header back in error bodies.
 */
export function redactSecret(text: string, secret: string): string {
  if (!secret) return text;
  return text.split(secret).join('***');
}

export function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
