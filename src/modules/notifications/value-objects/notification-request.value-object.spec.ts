import { describe, it, expect } from 'vitest';
import { NotificationRequest } from './notification-request.value-object';
import { ChannelType } from '../enums/channel-type.enum';
import { NotificationRequestValidationError } from '../exceptions/notification.exceptions';

describe('NotificationRequest', () => {
  const validProps = {
    tenantId: 'tenant-1',
    organizationId: 'org-1',
    siteId: 'site-1',
    leadId: 'lead-1',
    type: ChannelType.EMAIL,
    subject: 'Test Subject',
    body: 'Test body message',
    to: 'recipient@example.com',
  };

  describe('create', () => {
    it('should create a valid email request', () => {
      const request = NotificationRequest.create(validProps);

      expect(request.tenantId).toBe('tenant-1');
      expect(request.organizationId).toBe('org-1');
      expect(request.siteId).toBe('site-1');
      expect(request.leadId).toBe('lead-1');
      expect(request.type).toBe(ChannelType.EMAIL);
      expect(request.subject).toBe('Test Subject');
      expect(request.body).toBe('Test body message');
      expect(request.to).toBe('recipient@example.com');
    });

    it('should allow a request without subject', () => {
      const request = NotificationRequest.create({
        ...validProps,
        type: ChannelType.SMS,
        subject: null,
        to: '+14155550123',
      });

      expect(request.subject).toBeUndefined();
    });

    it('should trim all string fields', () => {
      const request = NotificationRequest.create({
        tenantId: '  tenant-1  ',
        organizationId: '  org-1  ',
        siteId: '  site-1  ',
        leadId: '  lead-1  ',
        type: ChannelType.EMAIL,
        subject: '  Subject  ',
        body: '  Body  ',
        to: '  to@example.com  ',
      });

      expect(request.tenantId).toBe('tenant-1');
      expect(request.organizationId).toBe('org-1');
      expect(request.siteId).toBe('site-1');
      expect(request.leadId).toBe('lead-1');
      expect(request.subject).toBe('Subject');
      expect(request.body).toBe('Body');
      expect(request.to).toBe('to@example.com');
    });

    it.each([
      'tenantId',
      'organizationId',
      'siteId',
      'leadId',
      'body',
      'to',
    ] as const)('should reject blank %s', (field) => {
      const create = () =>
        NotificationRequest.create({ ...validProps, [field]: '   ' });

      expect(create).toThrow(NotificationRequestValidationError);
      expect(create).toThrow(`${field} cannot be blank`);
    });

    it('should report the offending field and code', () => {
      try {
        NotificationRequest.create({ ...validProps, leadId: '' });
        expect.fail('expected validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(NotificationRequestValidationError);
        if (error instanceof NotificationRequestValidationError) {
          expect(error.field).toBe('leadId');
          expect(error.code).toBe('BLANK_FIELD');
        }
      }
    });

    it('should reject an unknown channel type', () => {
      try {
        NotificationRequest.create({
          ...validProps,
          type: 'fax' as ChannelType,
        });
        expect.fail('expected validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(NotificationRequestValidationError);
        if (error instanceof NotificationRequestValidationError) {
          expect(error.field).toBe('type');
          expect(error.code).toBe('INVALID_CHANNEL_TYPE');
          expect(error.message).toBe('type must be one of email, sms, push');
        }
      }
    });

    it('should be immutable', () => {
      const request = NotificationRequest.create(validProps);

      expect(Object.isFrozen(request)).toBe(true);
    });
  });

  describe('factories', () => {
    const { type: _type, ...untyped } = validProps;

    it('should fix the type for sms', () => {
      expect(NotificationRequest.sms(untyped).type).toBe(ChannelType.SMS);
    });

    it('should fix the type for email', () => {
      expect(NotificationRequest.email(untyped).type).toBe(ChannelType.EMAIL);
    });

    it('should fix the type for push', () => {
      expect(NotificationRequest.push(untyped).type).toBe(ChannelType.PUSH);
    });
  });

  describe('toProps', () => {
    it('should round-trip into an equal request', () => {
      const request = NotificationRequest.create(validProps);

      expect(NotificationRequest.create(request.toProps())).toEqual(request);
    });
  });
});
