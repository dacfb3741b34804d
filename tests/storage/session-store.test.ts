import { createMemorySessionStore } from '../../src/storage/memory-session-store';
import { SessionRecord, sessionFromRecord } from '../../src/storage/session-store';

describe('sessionFromRecord', () => {
  test('reads, writes and deletes keys on the underlying object', () => {
    const record: SessionRecord = { theme: 'dark' };
    const session = sessionFromRecord(record);

    session.set('AUTH_UNIQUE_ID', 42);
    expect(session.get('AUTH_UNIQUE_ID')).toBe(42);
    expect(record).toEqual({ theme: 'dark', AUTH_UNIQUE_ID: 42 });

    session.delete('AUTH_UNIQUE_ID');
    expect(session.get('AUTH_UNIQUE_ID')).toBeUndefined();
    expect(record).toEqual({ theme: 'dark' });
  });

  test('deleting an absent key is a no-op', () => {
    const record: SessionRecord = {};
    sessionFromRecord(record).delete('missing');
    expect(record).toEqual({});
  });
});

describe('createMemorySessionStore', () => {
  test('sessions are isolated from each other', () => {
    const store = createMemorySessionStore();
    store.forSession('a').set('AUTH_UNIQUE_ID', 'u1');
    store.forSession('b').set('AUTH_UNIQUE_ID', 'u2');

    expect(store.forSession('a').get('AUTH_UNIQUE_ID')).toBe('u1');
    expect(store.entries('b')).toEqual({ AUTH_UNIQUE_ID: 'u2' });
  });

  test('views of the same session share state', () => {
    const store = createMemorySessionStore();
    store.forSession('a').set('k', 'v');
    expect(store.forSession('a').get('k')).toBe('v');
  });

  test('unknown sessions read as empty', () => {
    const store = createMemorySessionStore();
    expect(store.forSession('nobody').get('k')).toBeUndefined();
    expect(store.entries('nobody')).toEqual({});
    expect(() => store.forSession('nobody').delete('k')).not.toThrow();
  });

  test('clear drops every session', () => {
    const store = createMemorySessionStore();
    store.forSession('a').set('k', 'v');
    store.clear();
    expect(store.entries('a')).toEqual({});
  });
});
