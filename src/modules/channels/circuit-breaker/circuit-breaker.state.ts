/**
 * Circuit breaker state machine.
 *
 *   CLOSED    --(failures >= threshold)------------------> OPEN
 *   OPEN      --(elapsed >= timeout, on permission check)-> HALF_OPEN
 *   HALF_OPEN --(success)--------------------------------> CLOSED
 *   HALF_OPEN --(failure)--------------------------------> OPEN
 *
 * Every path through the breaker goes through transitionCircuit, so the
 * permission check and the recording paths cannot disagree.
 */

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitSnapshot {
  readonly state: CircuitState;
  readonly failureCount: number;
  /** Epoch millis of the failure that last opened (or reopened) the circuit */
  readonly lastFailureAt: number | null;
}

export interface CircuitPolicy {
  readonly failureThreshold: number;
  readonly openTimeoutMs: number;
}

export type CircuitEvent =
  | { readonly type: 'permit'; readonly at: number }
  | { readonly type: 'success' }
  | { readonly type: 'failure'; readonly at: number }
  | { readonly type: 'reset' };

export const INITIAL_CIRCUIT: CircuitSnapshot = Object.freeze({
  state: CircuitState.CLOSED,
  failureCount: 0,
  lastFailureAt: null,
});

export function transitionCircuit(
  current: CircuitSnapshot,
  event: CircuitEvent,
  policy: CircuitPolicy,
): CircuitSnapshot {
  switch (event.type) {
    case 'reset':
      return INITIAL_CIRCUIT;
    case 'permit':
      return onPermitCheck(current, event.at, policy);
    case 'success':
      return onSuccess(current);
    case 'failure':
      return onFailure(current, event.at, policy);
  }
}

function onPermitCheck(
  current: CircuitSnapshot,
  at: number,
  policy: CircuitPolicy,
): CircuitSnapshot {
  if (current.state !== CircuitState.OPEN) {
    return current;
  }
  const openedAt = current.lastFailureAt ?? Number.NEGATIVE_INFINITY;
  return at - openedAt >= policy.openTimeoutMs
    ? { ...current, state: CircuitState.HALF_OPEN }
    : current;
}

function onSuccess(current: CircuitSnapshot): CircuitSnapshot {
  switch (current.state) {
    case CircuitState.HALF_OPEN:
      return { ...current, state: CircuitState.CLOSED, failureCount: 0 };
    case CircuitState.CLOSED:
      return current.failureCount === 0
        ? current
        : { ...current, failureCount: 0 };
    case CircuitState.OPEN:
      // nothing was let through, so nothing to learn
      return current;
  }
}

function onFailure(
  current: CircuitSnapshot,
  at: number,
  policy: CircuitPolicy,
): CircuitSnapshot {
  switch (current.state) {
    case CircuitState.HALF_OPEN:
      // restart the cooldown from the failed probe
      return { ...current, state: CircuitState.OPEN, lastFailureAt: at };
    case CircuitState.CLOSED: {
      const failureCount = current.failureCount + 1;
      return {
        state:
          failureCount >= policy.failureThreshold
            ? CircuitState.OPEN
            : CircuitState.CLOSED,
        failureCount,
        lastFailureAt: at,
      };
    }
    case CircuitState.OPEN:
      return current;
  }
}

export function permitsCalls(snapshot: CircuitSnapshot): boolean {
  return snapshot.state !== CircuitState.OPEN;
}
