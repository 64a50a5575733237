import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitGuardedChannel, CIRCUIT_OPEN_ERROR } from './circuit-breaker.channel';
import { CircuitBreaker } from './circuit-breaker';
import { CircuitState } from './circuit-breaker.state';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { ChannelConfigurationError } from '../exceptions/channel.exceptions';
import {
  DeliveryOutcome,
  NotificationChannelPort,
} from '../interfaces/channel.interface';
import {
  ManualClock,
  StubChannel,
  TestDataBuilder,
} from '../../../test/test-utils';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';

describe('CircuitGuardedChannel', () => {
  let clock: ManualClock;
  let delegate: StubChannel;
  let breaker: CircuitBreaker;
  let channel: CircuitGuardedChannel;

  beforeEach(() => {
    clock = new ManualClock();
    delegate = new StubChannel('sms-adapter', [ChannelType.SMS]);
    breaker = new CircuitBreaker('sms', {
      failureThreshold: 2,
      openTimeoutMs: 1000,
      clock,
    });
    channel = new CircuitGuardedChannel(delegate, breaker);
  });

  it('should expose the delegate name and capabilities', () => {
    expect(channel.name).toBe('sms-adapter');
    expect(channel.supports(ChannelType.SMS)).toBe(true);
    expect(channel.supports(ChannelType.EMAIL)).toBe(false);
    expect(channel.circuitBreaker).toBe(breaker);
  });

  it('should keep the delegate capabilities while open and half-open', async () => {
    delegate.shouldFail = true;
    const request = TestDataBuilder.createSmsRequest();
    await channel.send(request);
    await channel.send(request);

    expect(channel.getCircuitState()).toBe(CircuitState.OPEN);
    expect(channel.supports(ChannelType.SMS)).toBe(true);
    expect(channel.supports(ChannelType.EMAIL)).toBe(false);

    clock.advance(1000);
    breaker.mayProceed();

    expect(channel.getCircuitState()).toBe(CircuitState.HALF_OPEN);
    expect(channel.supports(ChannelType.SMS)).toBe(true);
    expect(channel.supports(ChannelType.EMAIL)).toBe(false);
  });

  describe('constructor', () => {
    it('should reject a missing delegate', () => {
      const build = () =>
        new CircuitGuardedChannel(null as unknown as NotificationChannelPort, breaker);

      expect(build).toThrow(ChannelConfigurationError);
      expect(build).toThrow('delegate cannot be null');
    });

    it('should reject a missing circuit breaker', () => {
      const build = () =>
        new CircuitGuardedChannel(delegate, null as unknown as CircuitBreaker);

      expect(build).toThrow(ChannelConfigurationError);
      expect(build).toThrow('circuitBreaker cannot be null');
    });
  });

  it('should pass successful outcomes through unchanged', async () => {
    const outcome = await channel.send(TestDataBuilder.createSmsRequest());

    expect(outcome).toEqual({
      success: true,
      vendor: 'sms-adapter',
      trackingId: 'sms-adapter-msg-1',
      deliveredAt: expect.any(Date),
    });
    expect(channel.getCircuitState()).toBe(CircuitState.CLOSED);
  });

  it('should open after repeated failures and stop calling the delegate', async () => {
    delegate.shouldFail = true;
    const request = TestDataBuilder.createSmsRequest();

    await channel.send(request);
    await channel.send(request);
    const outcome = await channel.send(request);

    expect(channel.getCircuitState()).toBe(CircuitState.OPEN);
    expect(delegate.sendCount).toBe(2);
    expect(outcome).toEqual({
      success: false,
      vendor: 'sms-circuit-breaker',
      error: CIRCUIT_OPEN_ERROR,
    });
  });

  it('should close again after a successful probe', async () => {
    delegate.shouldFail = true;
    const request = TestDataBuilder.createSmsRequest();
    await channel.send(request);
    await channel.send(request);

    clock.advance(1000);
    delegate.shouldFail = false;
    const outcome = await channel.send(request);

    expect(outcome.success).toBe(true);
    expect(delegate.sendCount).toBe(3);
    expect(channel.getCircuitState()).toBe(CircuitState.CLOSED);
  });

  it('should count a rejected send as a failure and rethrow', async () => {
    const throwing = {
      name: 'flaky',
      supports: () => true,
      send: (_request: NotificationRequest | null): Promise<DeliveryOutcome> =>
        Promise.reject(new Error('socket hang up')),
    };
    const guarded = new CircuitGuardedChannel(throwing, breaker);

    await expect(
      guarded.send(TestDataBuilder.createSmsRequest()),
    ).rejects.toThrow('socket hang up');
    expect(breaker.getFailureCount()).toBe(1);
  });

  it('should forward a null request to the delegate', async () => {
    await channel.send(null);

    expect(delegate.sent).toEqual([null]);
  });
});
