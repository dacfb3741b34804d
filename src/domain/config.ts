/**
 * Guard configuration.
 *
 * Built once at setup time and passed to every resolver, guard and session
 * helper, so no request ever observes a half-applied change.
 *
 * Usage:
 *   const config = createGuardConfig({ redirectUrl: '/login' });
 *   app.use(sessionAccount(() => new User(), { config }));
 *   app.get('/dashboard', loginRequired(config), dashboard);
 */

import { GuardError, configError } from './errors';

export interface GuardConfig {
  /** Login route that unauthenticated requests are sent to. */
  readonly redirectUrl: string;
  /** Login route that requests failing the admin guard are sent to. */
  readonly adminRedirectUrl: string;
  /** Query parameter carrying the path the request originally asked for. */
  readonly redirectParam: string;
  /** Session key holding the authenticated account's unique id. */
  readonly sessionKey: string;
  /** Percent-encode the original path inside the redirect query string. */
  readonly encodeRedirectPath: boolean;
  /** Delete a session entry whose account can no longer be loaded. */
  readonly clearStaleSession: boolean;
}

export const DEFAULT_GUARD_CONFIG: GuardConfig = Object.freeze({
  redirectUrl: '/account/login',
  adminRedirectUrl: '/admin/account/login',
  redirectParam: 'next',
  sessionKey: 'AUTH_UNIQUE_ID',
  encodeRedirectPath: true,
  clearStaleSession: false,
});

export interface GuardConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function isRedirectTarget(url: string): boolean {
  return url.startsWith('/') || /^https?:\/\//.test(url);
}

/** Validate a guard configuration for consistency. */
export function validateGuardConfig(config: GuardConfig): GuardConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const field of ['redirectUrl', 'adminRedirectUrl'] as const) {
    const url = config[field];
    if (url.length === 0) {
      errors.push(`${field} must not be empty`);
    } else if (!isRedirectTarget(url)) {
      errors.push(`${field} must be an absolute path or an http(s) URL`);
    } else if (url.includes('?')) {
      warnings.push(`${field} already has a query string; the redirect parameter is appended with "?"`);
    }
  }

  if (config.redirectParam.length === 0) {
    errors.push('redirectParam must not be empty');
  }
  if (config.sessionKey.length === 0) {
    errors.push('sessionKey must not be empty');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Create a frozen guard config from defaults. A field left out or set to
 * `undefined` keeps its default. Throws a GuardError when invalid.
 */
export function createGuardConfig(overrides?: Partial<GuardConfig>): GuardConfig {
  const config: GuardConfig = {
    redirectUrl: overrides?.redirectUrl ?? DEFAULT_GUARD_CONFIG.redirectUrl,
    adminRedirectUrl: overrides?.adminRedirectUrl ?? DEFAULT_GUARD_CONFIG.adminRedirectUrl,
    redirectParam: overrides?.redirectParam ?? DEFAULT_GUARD_CONFIG.redirectParam,
    sessionKey: overrides?.sessionKey ?? DEFAULT_GUARD_CONFIG.sessionKey,
    encodeRedirectPath: overrides?.encodeRedirectPath ?? DEFAULT_GUARD_CONFIG.encodeRedirectPath,
    clearStaleSession: overrides?.clearStaleSession ?? DEFAULT_GUARD_CONFIG.clearStaleSession,
  };
  const result = validateGuardConfig(config);
  if (!result.valid) {
    throw new GuardError(configError(result.errors));
  }
  return Object.freeze(config);
}

function parseFlag(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new GuardError(configError([`${name} must be one of true, false, 1, 0`]));
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Build a config from `SESSION_GUARD_*` environment variables.
 * Unset or empty variables fall back to the defaults.
 */
export function loadGuardConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const overrides: { -readonly [K in keyof GuardConfig]?: GuardConfig[K] } = {};

  const redirectUrl = nonEmpty(env.SESSION_GUARD_REDIRECT_URL);
  if (redirectUrl !== undefined) overrides.redirectUrl = redirectUrl;

  const adminRedirectUrl = nonEmpty(env.SESSION_GUARD_ADMIN_REDIRECT_URL);
  if (adminRedirectUrl !== undefined) overrides.adminRedirectUrl = adminRedirectUrl;

  const redirectParam = nonEmpty(env.SESSION_GUARD_REDIRECT_PARAM);
  if (redirectParam !== undefined) overrides.redirectParam = redirectParam;

  const sessionKey = nonEmpty(env.SESSION_GUARD_SESSION_KEY);
  if (sessionKey !== undefined) overrides.sessionKey = sessionKey;

  const encode = parseFlag('SESSION_GUARD_ENCODE_REDIRECT_PATH', env.SESSION_GUARD_ENCODE_REDIRECT_PATH);
  if (encode !== undefined) overrides.encodeRedirectPath = encode;

  const clearStale = parseFlag('SESSION_GUARD_CLEAR_STALE_SESSION', env.SESSION_GUARD_CLEAR_STALE_SESSION);
  if (clearStale !== undefined) overrides.clearStaleSession = clearStale;

  return createGuardConfig(overrides);
}
