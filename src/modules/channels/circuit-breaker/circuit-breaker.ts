import { Logger } from '@nestjs/common';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { Clock, SystemClock } from '../../../common/services/clock.service';
import { ChannelConfigurationError } from '../exceptions/channel.exceptions';
import {
  CircuitEvent,
  CircuitPolicy,
  CircuitSnapshot,
  CircuitState,
  INITIAL_CIRCUIT,
  permitsCalls,
  transitionCircuit,
} from './circuit-breaker.state';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  openTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Fault-isolation state machine guarding a single channel.
 *
 * Each public call applies exactly one event synchronously, so on the event
 * loop a read-modify-write of (state, failureCount, lastFailureAt) can never
 * interleave with another caller's.
 *
 * HALF_OPEN lets every caller through until a result is recorded; concurrent
 * probes are not limited.
 */
export class CircuitBreaker {
  private readonly logger: Logger;
  private readonly policy: CircuitPolicy;
  private readonly clock: Clock;
  private snapshot: CircuitSnapshot = INITIAL_CIRCUIT;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {},
  ) {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ChannelConfigurationError('circuit breaker name cannot be blank');
    }

    const failureThreshold =
      options.failureThreshold ??
      APP_CONSTANTS.CIRCUIT_BREAKER.DEFAULT_FAILURE_THRESHOLD;
    const openTimeoutMs =
      options.openTimeoutMs ??
      APP_CONSTANTS.CIRCUIT_BREAKER.DEFAULT_OPEN_TIMEOUT_MS;

    if (!Number.isInteger(failureThreshold) || failureThreshold < 1) {
      throw new ChannelConfigurationError(
        `failureThreshold must be a positive integer, got ${failureThreshold}`,
      );
    }
    if (!Number.isFinite(openTimeoutMs) || openTimeoutMs < 0) {
      throw new ChannelConfigurationError(
        `openTimeoutMs must be a non-negative number, got ${openTimeoutMs}`,
      );
    }

    this.policy = { failureThreshold, openTimeoutMs };
    this.clock = options.clock ?? new SystemClock();
    this.logger = new Logger(`${CircuitBreaker.name}:${name}`);
  }

  /**
   * Whether a call may be attempted now. An OPEN circuit whose timeout has
   * elapsed moves to HALF_OPEN here and lets the call through as a probe.
   */
  mayProceed(): boolean {
    this.apply({ type: 'permit', at: this.clock.now().getTime() });
    return permitsCalls(this.snapshot);
  }

  recordSuccess(): void {
    this.apply({ type: 'success' });
  }

  recordFailure(): void {
    this.apply({ type: 'failure', at: this.clock.now().getTime() });
  }

  /**
   * Operator override: close the circuit and forget past failures
   */
  reset(): void {
    this.apply({ type: 'reset' });
  }

  getState(): CircuitState {
    return this.snapshot.state;
  }

  getFailureCount(): number {
    return this.snapshot.failureCount;
  }

  getSnapshot(): CircuitSnapshot {
    return this.snapshot;
  }

  getPolicy(): CircuitPolicy {
    return this.policy;
  }

  private apply(event: CircuitEvent): void {
    const previous = this.snapshot;
    this.snapshot = transitionCircuit(previous, event, this.policy);

    if (this.snapshot.state === previous.state) {
      return;
    }

    const message = `Circuit ${this.name}: ${previous.state} -> ${this.snapshot.state}`;
    if (this.snapshot.state === CircuitState.OPEN) {
      this.logger.warn(
        `${message} after ${this.snapshot.failureCount} failure(s), retry in ${this.policy.openTimeoutMs}ms`,
      );
    } else {
      this.logger.log(message);
    }
  }
}
