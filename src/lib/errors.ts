/**
 * DevGate — Gateway Errors
 *
 * Error kinds surfaced to callers as `{ "detail": message }` with the
 * status carried by the error. Adapters never build HTTP responses
 * themselves; they throw one of these and the facade renders it.
 */

import { ZodError } from 'zod';

export type GatewayErrorKind =
  | 'configuration'
  | 'bad_request'
  | 'not_found'
  | 'upstream_error'
  | 'upstream_unavailable'
  | 'shape'
  | 'scrape';

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required secret or default identity is missing from the environment. */
export class ConfigurationError extends GatewayError {
  readonly kind = 'configuration' as const;
  readonly status = 500;

  constructor(readonly setting: string) {
    super(`${setting} is not configured.`);
  }
}

export class BadRequestError extends GatewayError {
  readonly kind = 'bad_request' as const;
  readonly status = 400;
}

export class NotFoundError extends GatewayError {
  readonly kind = 'not_found' as const;
  readonly status = 404;
}

/**
 * Upstream answered with a non-success status that the adapter does not
 * treat as "not found". The upstream status is passed through.
 */
export class UpstreamError extends GatewayError {
  readonly kind = 'upstream_error' as const;
  readonly status: number;

  constructor(
    readonly upstreamStatus: number,
    message: string
  ) {
    super(message);
    this.status = upstreamStatus >= 400 && upstreamStatus <= 599 ? upstreamStatus : 502;
  }
}

export class UpstreamUnavailableError extends GatewayError {
  readonly kind = 'upstream_unavailable' as const;
  readonly status = 503;

  constructor(label: string) {
    super(`Could not connect to the ${label} API.`);
  }
}

/** Upstream payload is missing a required field or has the wrong shape. */
export class ShapeError extends GatewayError {
  readonly kind = 'shape' as const;
  readonly status = 500;

  constructor(label: string, readonly issues: string[] = []) {
    super(`Unexpected response from the ${label} API.`);
  }
}

export class ScrapeError extends GatewayError {
  readonly kind = 'scrape' as const;
  readonly status = 500;
}

/** Thrown at startup when two routes would claim the same method and path. */
export class RouteCollisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteCollisionError';
  }
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Fail with a configuration error when a secret is absent.
 * Called on every request, before any network call.
 */
export function requireSetting<T>(value: T | undefined, setting: string): T {
  if (value === undefined || value === '') {
    throw new ConfigurationError(setting);
  }
  return value;
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Transport-level failure: DNS, refused connection, reset, timeout.
 * fetch rejects with a TypeError for network errors and a DOMException
 * named TimeoutError/AbortError when the signal fires.
 */
export function isTransportError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return (
    error instanceof TypeError ||
    error.name === 'TimeoutError' ||
    error.name === 'AbortError'
  );
}
