import axios from 'axios';

export type ErrorKind = 'invalid-input' | 'not-found' | 'upstream' | 'display' | 'config';

/**
 * Base class for every error the detection pipeline raises on purpose.
 * `kind` lets callers switch on the failure without instanceof chains.
 */
export abstract class FlightNotifierError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad coordinates or radius. Fatal to the call, never to the loop. */
export class InvalidInputError extends FlightNotifierError {
  readonly kind = 'invalid-input';
}

/** The upstream answered, but knows nothing about the aircraft. */
export class NotFoundError extends FlightNotifierError {
  readonly kind = 'not-found';
}

export class UpstreamError extends FlightNotifierError {
  readonly kind = 'upstream';
  readonly status?: number;
  readonly attemptsMade: number;

  constructor(
    message: string,
    options: { cause?: unknown; status?: number; attemptsMade?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.attemptsMade = options.attemptsMade ?? 1;
  }
}

export class DisplayError extends FlightNotifierError {
  readonly kind = 'display';
}

/** Invalid static configuration, the only error that stops the process */
export class ConfigError extends FlightNotifierError {
  readonly kind = 'config';
}

/**
 * Flatten an unknown thrown value into something a log line can carry
 */
export function describeError(error: unknown): { message: string; name?: string; code?: string; status?: number } {
  if (axios.isAxiosError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      status: error.response?.status,
    };
  }
  if (error instanceof UpstreamError) {
    return { name: error.name, message: error.message, status: error.status };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
