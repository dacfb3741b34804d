/**
 * Account capability contract.
 *
 * The embedding application supplies the concrete principal type; this
 * library only drives it through the operations below.
 */

/** Opaque identifier of a principal, stable for its lifetime and comparable with `===`. */
export type AccountId = string | number;

/**
 * A principal that can be resolved from, and persisted into, a session.
 *
 * `TSelf` is the implementing type, so `getById` hands back the same
 * concrete account the application works with:
 *
 * ```ts
 * class User implements Account<User> {
 *   async getById(id: AccountId): Promise<User> { ... }
 * }
 * ```
 */
export interface Account<TSelf extends Account<TSelf>> {
  /** Whether this account is logged in. */
  isAuthenticated(): boolean;

  /** Whether this account holds administrator privileges. */
  isAdmin(): boolean;

  /** Set the authenticated flag and any data derived from it. Must not change identity. */
  login(): void;

  /** Clear the authenticated flag and any sensitive data. Must not change identity. */
  logout(): void;

  uniqueId(): AccountId;

  /**
   * Load the account identified by `id`. Throws (or rejects) when the id
   * cannot be resolved, e.g. the principal was deleted.
   */
  getById(id: AccountId): TSelf | Promise<TSelf>;
}

/** Produces a fresh zero-value (anonymous) account. */
export type AccountFactory<A extends Account<A>> = () => A;

/** Whether a raw session value can be used as an account id. */
export function isAccountId(value: unknown): value is AccountId {
  if (typeof value === 'string') return true;
  return typeof value === 'number' && Number.isFinite(value);
}
