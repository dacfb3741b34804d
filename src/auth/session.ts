/**
 * Imperative session transitions, called by application code after it has
 * verified credentials, signed a user out, or changed an account's identity.
 */

import { Account } from '../domain/account';
import { GuardConfig } from '../domain/config';
import { SessionStore } from '../storage/session-store';
import { logger } from '../logger';

/**
 * Mark a verified account as logged in and record its id in the session.
 * Session backend failures propagate.
 */
export function authenticateSession<A extends Account<A>>(
  session: SessionStore,
  account: A,
  config: GuardConfig,
): void {
  account.login();
  updateSession(session, account, config);
  logger.info('Session authenticated', { accountId: account.uniqueId() });
}

/** Log the account out and unlink it from the session. */
export function logout<A extends Account<A>>(session: SessionStore, account: A, config: GuardConfig): void {
  account.logout();
  session.delete(config.sessionKey);
  logger.info('Session logged out', { accountId: account.uniqueId() });
}

/** Write the account's current id to the session, overwriting any prior value. */
export function updateSession<A extends Account<A>>(session: SessionStore, account: A, config: GuardConfig): void {
  session.set(config.sessionKey, account.uniqueId());
}
