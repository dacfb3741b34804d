/**
 * Typed error model.
 *
 * Failures that leave this library carry a namespaced code so the host
 * pipeline can map them to responses without string matching on messages.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "AUTH.CONTEXT_UNRESOLVED"). */
  code: string;
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown (or passed to `next`) by this library. */
export class GuardError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'GuardError';
  }
}

/** Narrow an unknown value to a GuardError. */
export function isGuardError(err: unknown): err is GuardError {
  return err instanceof GuardError;
}

// --- Factory functions ---

export function contextUnresolvedError(): TypedError {
  return createTypedError({
    code: 'AUTH.CONTEXT_UNRESOLVED',
    message: 'No account is bound to this request',
    suggestedFixes: [
      {
        type: 'MOUNT_RESOLVER',
        params: {},
        description: 'Mount sessionAccount() before any guard or handler that reads the account',
      },
    ],
  });
}

export function contextAlreadyBoundError(): TypedError {
  return createTypedError({
    code: 'AUTH.CONTEXT_ALREADY_BOUND',
    message: 'An account is already bound to this request',
    suggestedFixes: [
      { type: 'REMOVE_DUPLICATE_RESOLVER', params: {}, description: 'Mount sessionAccount() once per route' },
    ],
  });
}

export function accountLookupError(sessionKey: string, cause: string): TypedError {
  return createTypedError({
    code: 'ACCOUNT.LOOKUP_FAILED',
    message: `Account lookup failed: ${cause}`,
    details: { sessionKey },
  });
}

export function sessionMissingError(): TypedError {
  return createTypedError({
    code: 'SESSION.MISSING',
    message: 'Request has no session attached',
    suggestedFixes: [
      {
        type: 'MOUNT_SESSION_MIDDLEWARE',
        params: {},
        description: 'Mount a session middleware that sets req.session before sessionAccount()',
      },
    ],
  });
}

export function configError(errors: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.CONFIG',
    message: `Invalid guard configuration: ${errors.join('; ')}`,
    details: { errors },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
