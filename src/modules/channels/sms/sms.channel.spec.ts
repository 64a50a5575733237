import { describe, it, expect } from 'vitest';
import { SmsChannel } from './sms.channel';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { TestDataBuilder } from '../../../test/test-utils';

describe('SmsChannel', () => {
  it('should support only sms', () => {
    const channel = new SmsChannel();

    expect(channel.name).toBe('sms-adapter');
    expect(channel.supports(ChannelType.SMS)).toBe(true);
    expect(channel.supports(ChannelType.EMAIL)).toBe(false);
    expect(channel.supports(ChannelType.PUSH)).toBe(false);
  });

  it('should deliver to a formatted phone number', async () => {
    const outcome = await new SmsChannel().send(
      TestDataBuilder.createSmsRequest({ to: '+1 (415) 555-0123' }),
    );

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.vendor).toBe('sms-adapter');
      expect(outcome.trackingId).toMatch(/^sms-[0-9a-f-]{36}$/);
    }
  });

  it.each(['abc', '0123456', '+1234567890123456'])(
    'should reject recipient %s',
    async (to) => {
      const outcome = await new SmsChannel().send(
        TestDataBuilder.createSmsRequest({ to }),
      );

      expect(outcome).toEqual({
        success: false,
        vendor: 'sms-adapter',
        error: `invalid recipient for sms: ${to}`,
      });
    },
  );

  it('should fail every send when simulating a vendor outage', async () => {
    const outcome = await new SmsChannel({ simulateFailure: true }).send(
      TestDataBuilder.createSmsRequest(),
    );

    expect(outcome).toEqual({
      success: false,
      vendor: 'sms-adapter',
      error: 'simulated SMS vendor failure',
    });
  });

  it('should report the outage before checking the recipient', async () => {
    const outcome = await new SmsChannel({ simulateFailure: true }).send(
      TestDataBuilder.createSmsRequest({ to: 'abc' }),
    );

    expect(outcome).toEqual({
      success: false,
      vendor: 'sms-adapter',
      error: 'simulated SMS vendor failure',
    });
  });

  it('should fail email requests as unsupported', async () => {
    const outcome = await new SmsChannel().send(TestDataBuilder.createRequest());

    expect(outcome).toEqual({
      success: false,
      vendor: 'sms-adapter',
      error: 'unsupported type: email',
    });
  });
});
