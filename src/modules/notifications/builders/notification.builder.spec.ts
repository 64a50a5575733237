import { describe, it, expect } from 'vitest';
import { NotificationRequestBuilder } from './notification.builder';
import { ChannelType } from '../enums/channel-type.enum';
import { NotificationRequestValidationError } from '../exceptions/notification.exceptions';

describe('NotificationRequestBuilder', () => {
  const completeBuilder = () =>
    NotificationRequestBuilder.create()
      .tenant('tenant-1')
      .organization('org-1')
      .site('site-1')
      .lead('lead-1')
      .type(ChannelType.SMS)
      .body('Your appointment is confirmed')
      .to('+14155550123');

  it('should build a request from all fields', () => {
    const request = completeBuilder().subject('Reminder').build();

    expect(request.toProps()).toEqual({
      tenantId: 'tenant-1',
      organizationId: 'org-1',
      siteId: 'site-1',
      leadId: 'lead-1',
      type: ChannelType.SMS,
      subject: 'Reminder',
      body: 'Your appointment is confirmed',
      to: '+14155550123',
    });
  });

  it('should leave subject undefined when not set', () => {
    expect(completeBuilder().build().subject).toBeUndefined();
  });

  it('should reject a missing type', () => {
    const build = () =>
      NotificationRequestBuilder.create()
        .tenant('tenant-1')
        .organization('org-1')
        .site('site-1')
        .lead('lead-1')
        .body('hello')
        .to('+14155550123')
        .build();

    expect(build).toThrow(NotificationRequestValidationError);
    expect(build).toThrow('type cannot be null');
  });

  it('should reject a missing destination', () => {
    const build = () =>
      NotificationRequestBuilder.create()
        .tenant('tenant-1')
        .organization('org-1')
        .site('site-1')
        .lead('lead-1')
        .type(ChannelType.EMAIL)
        .body('hello')
        .build();

    expect(build).toThrow('to cannot be blank');
  });

  it('should copy an existing request and allow overrides', () => {
    const original = completeBuilder().build();

    const copy = NotificationRequestBuilder.fromRequest(original)
      .type(ChannelType.EMAIL)
      .to('lead@example.com')
      .build();

    expect(copy.type).toBe(ChannelType.EMAIL);
    expect(copy.to).toBe('lead@example.com');
    expect(copy.leadId).toBe(original.leadId);
    expect(original.type).toBe(ChannelType.SMS);
  });
});
