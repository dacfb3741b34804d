/**
 * session-guard — session-backed account resolution and login guards for
 * Express.
 *
 *   const config = createGuardConfig();
 *   app.use(session({ ... }));
 *   app.use(sessionAccount(() => new User(), { config }));
 *   app.get('/dashboard', loginRequired(config), showDashboard);
 *   app.get('/admin', adminRequired(config), showAdmin);
 */

export * from './domain';
export * from './auth';
export * from './storage';
export {
  sessionAccount,
  currentAccount,
  loginRequired,
  adminRequired,
  errorHandler,
} from './api/middleware';
export type { AnyAccount, AuthContext, AuthenticatedRequest, SessionAccountOptions } from './api/middleware';
export { createLogger, describeError, logger, resetLogging, setLogHandler, setLogLevel, LogLevel } from './logger';
export type { LogEntry, LogHandler, Logger } from './logger';
