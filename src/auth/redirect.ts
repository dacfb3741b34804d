/**
 * Redirect targets for failed guards.
 */

import type { Request } from 'express';

/** Percent-encode a path for a query value, keeping `/` readable. */
export function encodeRedirectPath(path: string): string {
  return encodeURIComponent(path).replace(/%2F/g, '/');
}

/**
 * Build `{url}?{param}={path}`.
 *
 *   buildRedirectUrl('/account/login', 'next', '/dashboard', true)
 *   // → '/account/login?next=/dashboard'
 *
 * With `encode` off the path is interpolated as-is, so a path holding `&`
 * or `=` leaks extra parameters into the login URL.
 */
export function buildRedirectUrl(url: string, param: string, path: string, encode: boolean): string {
  const value = encode ? encodeRedirectPath(path) : path;
  return `${url}?${param}=${value}`;
}

/** Full path the client asked for, including any mount prefix, without the query string. */
export function requestPath(req: Pick<Request, 'originalUrl' | 'url'>): string {
  const url = req.originalUrl || req.url;
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}
