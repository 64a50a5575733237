import { ChannelType, isChannelType } from '../enums/channel-type.enum';
import { NotificationRequestValidationError } from '../exceptions/notification.exceptions';

export interface NotificationRequestProps {
  tenantId: string;
  organizationId: string;
  siteId: string;
  leadId: string;
  type: ChannelType;
  subject?: string | null;
  body: string;
  to: string;
}

export type TypedNotificationRequestProps = Omit<NotificationRequestProps, 'type'>;

/**
 * Notification Request Value Object - one outbound message addressed to a lead
 *
 * Tenant, organization and site identify who is sending; tenant + lead is the
 * rate-limit identity. Every string is stored trimmed and the instance is
 * frozen, so a request can be handed to any number of channels safely.
 */
export class NotificationRequest {
  readonly tenantId: string;
  readonly organizationId: string;
  readonly siteId: string;
  readonly leadId: string;
  readonly type: ChannelType;
  readonly subject?: string;
  readonly body: string;
  readonly to: string;

  private constructor(props: NotificationRequestProps) {
    this.tenantId = requireText(props.tenantId, 'tenantId');
    this.organizationId = requireText(props.organizationId, 'organizationId');
    this.siteId = requireText(props.siteId, 'siteId');
    this.leadId = requireText(props.leadId, 'leadId');
    this.type = requireChannelType(props.type);
    this.subject = props.subject?.trim();
    this.body = requireText(props.body, 'body');
    this.to = requireText(props.to, 'to');
    Object.freeze(this);
  }

  static create(props: NotificationRequestProps): NotificationRequest {
    return new NotificationRequest(props);
  }

  static sms(props: TypedNotificationRequestProps): NotificationRequest {
    return new NotificationRequest({ ...props, type: ChannelType.SMS });
  }

  static email(props: TypedNotificationRequestProps): NotificationRequest {
    return new NotificationRequest({ ...props, type: ChannelType.EMAIL });
  }

  static push(props: TypedNotificationRequestProps): NotificationRequest {
    return new NotificationRequest({ ...props, type: ChannelType.PUSH });
  }

  toProps(): NotificationRequestProps {
    return {
      tenantId: this.tenantId,
      organizationId: this.organizationId,
      siteId: this.siteId,
      leadId: this.leadId,
      type: this.type,
      subject: this.subject,
      body: this.body,
      to: this.to,
    };
  }
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new NotificationRequestValidationError(
      `${field} cannot be blank`,
      field,
    );
  }
  return value.trim();
}

function requireChannelType(value: unknown): ChannelType {
  if (!isChannelType(value)) {
    throw new NotificationRequestValidationError(
      `type must be one of ${Object.values(ChannelType).join(', ')}`,
      'type',
      'INVALID_CHANNEL_TYPE',
    );
  }
  return value;
}
