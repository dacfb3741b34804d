/**
 * In-memory session store.
 *
 * Reference implementation for development and testing. Each session id
 * maps to its own key/value table; `forSession` hands out a SessionStore
 * bound to one id, the way a session middleware would for one request.
 */

import { SessionStore } from './session-store';

export interface MemorySessionStore {
  /** SessionStore view over the session `sessionId`, created on first write. */
  forSession(sessionId: string): SessionStore;
  /** Snapshot of one session's entries. */
  entries(sessionId: string): Record<string, unknown>;
  /** Drop every session. */
  clear(): void;
}

export function createMemorySessionStore(): MemorySessionStore {
  const sessions = new Map<string, Map<string, unknown>>();

  return {
    forSession(sessionId) {
      return {
        get: (key) => sessions.get(sessionId)?.get(key),
        set: (key, value) => {
          let table = sessions.get(sessionId);
          if (!table) {
            table = new Map();
            sessions.set(sessionId, table);
          }
          table.set(key, value);
        },
        delete: (key) => {
          sessions.get(sessionId)?.delete(key);
        },
      };
    },
    entries(sessionId) {
      return Object.fromEntries(sessions.get(sessionId) ?? new Map<string, unknown>());
    },
    clear() {
      sessions.clear();
    },
  };
}
