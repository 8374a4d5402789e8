/**
 * Error taxonomy for the render service
 */

export type ErrorKind = 'validation' | 'engine-unavailable' | 'engine-failure' | 'timeout' | 'cancelled';

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'ENGINE_UNAVAILABLE'
  | 'RENDERING_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'PAYLOAD_TOO_LARGE'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/**
 * Base class for every classified failure that can reach a caller
 */
export abstract class RenderServiceError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or out-of-range input. Never reaches the engine.
 */
export class ValidationError extends RenderServiceError {
  readonly kind = 'validation' as const;
  readonly code = 'INVALID_REQUEST' as const;
  readonly status = 400;

  constructor(
    readonly field: string,
    readonly constraint: string
  ) {
    super(`Invalid ${field}: ${constraint}`);
  }
}

/**
 * No context could be checked out of the engine
 */
export class AcquisitionError extends RenderServiceError {
  readonly kind = 'engine-unavailable' as const;
  readonly code = 'ENGINE_UNAVAILABLE' as const;
  readonly status = 503;
}

export type RenderErrorKind = 'engine-failure' | 'timeout' | 'cancelled';

const RENDER_ERROR_CODES: Record<RenderErrorKind, ErrorCode> = {
  'engine-failure': 'RENDERING_FAILED',
  timeout: 'TIMEOUT',
  cancelled: 'CANCELLED',
};

// 499: nginx's "client closed request"; nobody reads it, it only shows up in logs
const RENDER_ERROR_STATUS: Record<RenderErrorKind, number> = {
  'engine-failure': 500,
  timeout: 504,
  cancelled: 499,
};

export class RenderError extends RenderServiceError {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(
    readonly kind: RenderErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = RENDER_ERROR_CODES[kind];
    this.status = RENDER_ERROR_STATUS[kind];
  }
}

/**
 * The engine could not be launched within the startup window
 */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
