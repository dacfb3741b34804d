/**
 * Session storage interfaces.
 *
 * The session is owned by the host application's session middleware; this
 * library only reads and writes one key through the contract below. Calls
 * are synchronous, and a failing backend surfaces as a thrown error.
 */

import type { Request } from 'express';

/** Key/value session scoped to one request. */
export interface SessionStore {
  /** Value under `key`, or `undefined` when absent. */
  get(key: string): unknown;
  /** Store `value` under `key`, overwriting any prior value. */
  set(key: string, value: unknown): void;
  /** Remove `key`. Removing an absent key is a no-op. */
  delete(key: string): void;
}

/** Plain object form of a session, as session middlewares expose it on `req.session`. */
export type SessionRecord = Record<string, unknown>;

/** Request carrying a session object. */
export interface SessionRequest extends Request {
  session?: SessionRecord;
}

/** Adapt a plain session object to the SessionStore contract. */
export function sessionFromRecord(record: SessionRecord): SessionStore {
  return {
    get: (key) => record[key],
    set: (key, value) => {
      record[key] = value;
    },
    delete: (key) => {
      delete record[key];
    },
  };
}

/** SessionStore over `req.session`, or `undefined` when no session middleware ran. */
export function requestSession(req: SessionRequest): SessionStore | undefined {
  return req.session ? sessionFromRecord(req.session) : undefined;
}
