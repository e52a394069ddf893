/**
 * Typed error hierarchy for wiki operations
 *
 * Every error carries a `kind` discriminator; the mutation pipeline reads
 * `retryable` to decide whether a failed attempt is worth one more try.
 *
 * ```ts
 * try {
 *   await client.edit('Sandbox', text, 'test');
 * } catch (error) {
 *   if (error instanceof PermissionError && error.reason === 'protected') { ... }
 *   if (isWikiError(error) && error.kind === 'TRANSIENT') { ... }
 * }
 * ```
 */

export type WikiErrorKind =
  | 'AUTHENTICATION'
  | 'PERMISSION'
  | 'SESSION'
  | 'TRANSIENT'
  | 'PROTOCOL'
  | 'VALIDATION'
  | 'ASSERTION'
  | 'HTTP';

export abstract class WikiError extends Error {
  abstract readonly kind: WikiErrorKind;

  /** Whether the mutation pipeline may run the operation once more */
  get retryable(): boolean {
    return false;
  }

  constructor(message: string) {
    super(message);
    this.name = 'WikiError';
    Object.setPrototypeOf(this, WikiError.prototype);
  }
}

export type AuthenticationFailure = 'bad-credentials' | 'unknown-account' | 'unknown';

/**
 * Login rejected by the server
 */
export class AuthenticationError extends WikiError {
  readonly kind = 'AUTHENTICATION' as const;

  constructor(
    message: string,
    readonly reason: AuthenticationFailure,
    readonly serverResult?: string
  ) {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export type PermissionFailure = 'protected' | 'cascade-protected' | 'missing-right';

/**
 * The current identity may not perform the action on the target.
 * Raised before any mutating request is sent.
 */
export class PermissionError extends WikiError {
  readonly kind = 'PERMISSION' as const;

  constructor(
    message: string,
    readonly reason: PermissionFailure,
    readonly title?: string
  ) {
    super(message);
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

export type SessionFailure = 'expired' | 'blocked';

export class SessionError extends WikiError {
  readonly kind = 'SESSION' as const;

  constructor(
    message: string,
    readonly reason: SessionFailure
  ) {
    super(message);
    this.name = 'SessionError';
    Object.setPrototypeOf(this, SessionError.prototype);
  }
}

export type TransientFailure = 'ratelimited' | 'readonly';

/**
 * Server-side condition expected to clear (rate limit, read-only database)
 */
export class TransientError extends WikiError {
  readonly kind = 'TRANSIENT' as const;

  constructor(
    message: string,
    readonly reason: TransientFailure
  ) {
    super(message);
    this.name = 'TransientError';
    Object.setPrototypeOf(this, TransientError.prototype);
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * Response that matched no known success or error marker.
 * `raw` holds the full response body.
 */
export class ProtocolError extends WikiError {
  readonly kind = 'PROTOCOL' as const;

  constructor(
    message: string,
    readonly raw: string,
    readonly code?: string,
    private readonly mayRetry: boolean = false
  ) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }

  override get retryable(): boolean {
    return this.mayRetry;
  }
}

/**
 * Local precondition failure, raised before any network call
 */
export class ValidationError extends WikiError {
  readonly kind = 'VALIDATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export type AssertionName = 'logged-in' | 'bot' | 'no-messages';

export class AssertionError extends WikiError {
  readonly kind = 'ASSERTION' as const;

  constructor(
    message: string,
    readonly assertion: AssertionName
  ) {
    super(message);
    this.name = 'AssertionError';
    Object.setPrototypeOf(this, AssertionError.prototype);
  }
}

/**
 * Non-2xx response or a request that timed out.
 * `status` is 0 when no response arrived.
 */
export class HttpError extends WikiError {
  readonly kind = 'HTTP' as const;

  constructor(
    message: string,
    readonly status: number,
    readonly timedOut: boolean = false
  ) {
    super(message);
    this.name = 'HttpError';
    Object.setPrototypeOf(this, HttpError.prototype);
  }

  override get retryable(): boolean {
    return this.timedOut || this.status >= 500;
  }
}

export function isWikiError(error: unknown): error is WikiError {
  return error instanceof WikiError;
}
