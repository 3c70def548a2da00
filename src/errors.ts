/** Error taxonomy for fetch attempts and engine failures */

export type FetchErrorKind =
  | 'Timeout'
  | 'TransportError'
  | 'HttpStatusError'
  | 'ReadinessTimeout'
  | 'ExtractionError';

export abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TimeoutError extends FetchError {
  readonly kind = 'Timeout';
}

export class TransportError extends FetchError {
  readonly kind = 'TransportError';
}

export class HttpStatusError extends FetchError {
  readonly kind = 'HttpStatusError';

  constructor(readonly status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
  }
}

export class ReadinessTimeoutError extends FetchError {
  readonly kind = 'ReadinessTimeout';
}

export class ExtractionError extends FetchError {
  readonly kind = 'ExtractionError';
}

/** A worker could not create any client, with or without a proxy. */
export class WorkerError extends Error {
  constructor(readonly workerId: number, message: string, options?: { cause?: unknown }) {
    super(`Worker ${workerId}: ${message}`, options);
    this.name = 'WorkerError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
