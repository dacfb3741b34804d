/**
 * Session-to-account resolution.
 *
 * Turns the id stored in the session into a bound account. A request whose
 * session holds no id, or an id that no longer resolves, proceeds as the
 * anonymous zero-value account; only a failing session backend propagates.
 */

import { Account, AccountFactory, isAccountId } from '../domain/account';
import { AuthState } from '../domain/auth-state';
import { GuardConfig } from '../domain/config';
import { accountLookupError } from '../domain/errors';
import { SessionStore } from '../storage/session-store';
import { Logger, describeError, logger as rootLogger } from '../logger';

/** Outcome of resolving one request's session. */
export interface ResolvedAccount<A extends Account<A>> {
  account: A;
  state: AuthState.Anonymous | AuthState.Authenticated;
}

export async function resolveAccount<A extends Account<A>>(
  newAccount: AccountFactory<A>,
  session: SessionStore,
  config: GuardConfig,
  log: Logger = rootLogger,
): Promise<ResolvedAccount<A>> {
  const anonymous = newAccount();
  const storedId = session.get(config.sessionKey);
  log.debug('Resolving session account', { sessionKey: config.sessionKey, storedId });

  if (storedId === undefined || storedId === null) {
    return { account: anonymous, state: AuthState.Anonymous };
  }

  const fallBack = (cause: string): ResolvedAccount<A> => {
    const typed = accountLookupError(config.sessionKey, cause);
    log.warn('Account lookup failed', { code: typed.code, sessionKey: config.sessionKey, error: cause });
    if (config.clearStaleSession) {
      session.delete(config.sessionKey);
      log.info('Stale session entry cleared', { sessionKey: config.sessionKey });
    }
    return { account: anonymous, state: AuthState.Anonymous };
  };

  if (!isAccountId(storedId)) {
    return fallBack(`unusable id of type ${typeof storedId}`);
  }

  let account: A;
  try {
    account = await anonymous.getById(storedId);
  } catch (err) {
    return fallBack(describeError(err));
  }

  account.login();
  log.debug('Session account resolved', { accountId: account.uniqueId() });
  return { account, state: AuthState.Authenticated };
}
