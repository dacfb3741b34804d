export * from './session-store';
export * from './memory-session-store';
