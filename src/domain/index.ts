/**
 * Domain model exports.
 */

export * from './account';
export * from './auth-state';
export * from './config';
export * from './errors';
