export * from './redirect';
export * from './resolver';
export * from './session';
