/**
 * API Middleware — session account resolution, login/admin guards, and
 * error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { Account, AccountFactory } from '../domain/account';
import { AuthState, transitionAuthState } from '../domain/auth-state';
import { DEFAULT_GUARD_CONFIG, GuardConfig } from '../domain/config';
import {
  TypedError,
  GuardError,
  apiError,
  contextAlreadyBoundError,
  contextUnresolvedError,
  createTypedError,
  isGuardError,
  sessionMissingError,
} from '../domain/errors';
import { resolveAccount } from '../auth/resolver';
import { buildRedirectUrl, requestPath } from '../auth/redirect';
import { SessionRequest, SessionStore, requestSession } from '../storage/session-store';
import { Logger, describeError, logger } from '../logger';

/** Any self-typed account; what guards need to read. */
export interface AnyAccount extends Account<AnyAccount> {}

/** The account bound to one request and where it stands in the auth state machine. */
export interface AuthContext<A extends Account<A>> {
  readonly account: A;
  state: AuthState;
}

/** Extended request with the resolved account context. */
export interface AuthenticatedRequest<A extends Account<A> = AnyAccount> extends SessionRequest {
  auth?: AuthContext<A>;
}

export interface SessionAccountOptions {
  config?: GuardConfig;
  /** Session for this request; defaults to an adapter over `req.session`. */
  getSession?: (req: SessionRequest) => SessionStore | undefined;
  logger?: Logger;
}

/**
 * Resolver middleware. Reads the session, loads the account and binds it to
 * `req.auth`. Mount once, before any guard.
 */
export function sessionAccount<A extends Account<A>>(
  newAccount: AccountFactory<A>,
  options: SessionAccountOptions = {},
) {
  const config = options.config ?? DEFAULT_GUARD_CONFIG;
  const getSession = options.getSession ?? requestSession;
  const log = options.logger ?? logger;

  return async (req: AuthenticatedRequest<A>, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (req.auth) {
        throw new GuardError(contextAlreadyBoundError());
      }
      const session = getSession(req);
      if (!session) {
        throw new GuardError(sessionMissingError());
      }

      const resolved = await resolveAccount(newAccount, session, config, log);
      const transition = transitionAuthState(AuthState.Unresolved, resolved.state);
      if (!transition.success || !transition.newState) {
        throw new GuardError(transitionFailure(transition.error));
      }
      req.auth = { account: resolved.account, state: transition.newState };
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** The account bound by sessionAccount(). Throws when the resolver has not run. */
export function currentAccount<A extends Account<A>>(req: AuthenticatedRequest<A>): A {
  if (!req.auth) {
    throw new GuardError(contextUnresolvedError());
  }
  return req.auth.account;
}

function transitionFailure(error: TypedError | undefined): TypedError {
  return error ?? createTypedError({ code: 'AUTH.INVALID_TRANSITION', message: 'Invalid auth state transition' });
}

function createGuard(
  name: string,
  rejects: (account: AnyAccount) => boolean,
  redirectUrl: string,
  config: GuardConfig,
) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const auth = req.auth;
    if (!auth) {
      next(new GuardError(contextUnresolvedError()));
      return;
    }

    const rejected = rejects(auth.account);
    const transition = transitionAuthState(auth.state, rejected ? AuthState.Redirected : AuthState.Passed);
    if (!transition.success || !transition.newState) {
      next(new GuardError(transitionFailure(transition.error)));
      return;
    }
    auth.state = transition.newState;

    if (!rejected) {
      logger.debug(`${name} passed`, { accountId: auth.account.uniqueId() });
      next();
      return;
    }

    const path = requestPath(req);
    const location = buildRedirectUrl(redirectUrl, config.redirectParam, path, config.encodeRedirectPath);
    logger.debug(`${name} redirecting`, { accountId: auth.account.uniqueId(), path, location });
    res.redirect(302, location);
  };
}

/** Redirect to the login page unless the bound account is authenticated. */
export function loginRequired(config: GuardConfig = DEFAULT_GUARD_CONFIG) {
  return createGuard('LoginRequired', (account) => !account.isAuthenticated(), config.redirectUrl, config);
}

/** Redirect to the admin login page unless the bound account is an authenticated admin. */
export function adminRequired(config: GuardConfig = DEFAULT_GUARD_CONFIG) {
  return createGuard(
    'AdminRequired',
    (account) => !account.isAuthenticated() || !account.isAdmin(),
    config.adminRedirectUrl,
    config,
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isGuardError(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  logger.error('Unhandled request error', {
    message: describeError(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error && err.message ? err.message : 'Internal server error',
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.CONTEXT_') || error.code === 'AUTH.INVALID_TRANSITION') return 500;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}
