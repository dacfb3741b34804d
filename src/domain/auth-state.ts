/**
 * Per-request authentication state machine.
 *
 *   unresolved -> anonymous | authenticated      (resolver)
 *   anonymous | authenticated | passed -> passed | redirected   (guards)
 *
 * `redirected` is terminal: the route handler never runs.
 */

import { TypedError, createTypedError } from './errors';

export enum AuthState {
  Unresolved = 'unresolved',
  Anonymous = 'anonymous',
  Authenticated = 'authenticated',
  Passed = 'passed',
  Redirected = 'redirected',
}

/** Valid state transitions for a request's authentication state. */
export const VALID_AUTH_TRANSITIONS: Record<AuthState, AuthState[]> = {
  [AuthState.Unresolved]: [AuthState.Anonymous, AuthState.Authenticated],
  [AuthState.Anonymous]: [AuthState.Passed, AuthState.Redirected],
  [AuthState.Authenticated]: [AuthState.Passed, AuthState.Redirected],
  [AuthState.Passed]: [AuthState.Passed, AuthState.Redirected],
  [AuthState.Redirected]: [],
};

/** Result of a state transition attempt. */
export interface TransitionResult {
  success: boolean;
  newState?: AuthState;
  error?: TypedError;
}

/** Attempt an authentication state transition. */
export function transitionAuthState(current: AuthState, target: AuthState): TransitionResult {
  const validTargets = VALID_AUTH_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'AUTH.INVALID_TRANSITION',
        message: `Invalid auth state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newState: target };
}

export function isTerminalAuthState(state: AuthState): boolean {
  return state === AuthState.Redirected;
}
