import { ChannelType } from '../enums/channel-type.enum';
import { NotificationRequestValidationError } from '../exceptions/notification.exceptions';
import {
  NotificationRequest,
  NotificationRequestProps,
} from '../value-objects/notification-request.value-object';

/**
 * Fluent builder for notification requests
 * Validation happens once, in build(), through NotificationRequest.create
 */
export class NotificationRequestBuilder {
  private props: Partial<NotificationRequestProps> = {};

  private constructor() {}

  static create(): NotificationRequestBuilder {
    return new NotificationRequestBuilder();
  }

  /**
   * Start from an existing request, e.g. to resend on another channel type
   */
  static fromRequest(request: NotificationRequest): NotificationRequestBuilder {
    const builder = new NotificationRequestBuilder();
    builder.props = request.toProps();
    return builder;
  }

  tenant(tenantId: string): NotificationRequestBuilder {
    this.props.tenantId = tenantId;
    return this;
  }

  organization(organizationId: string): NotificationRequestBuilder {
    this.props.organizationId = organizationId;
    return this;
  }

  site(siteId: string): NotificationRequestBuilder {
    this.props.siteId = siteId;
    return this;
  }

  lead(leadId: string): NotificationRequestBuilder {
    this.props.leadId = leadId;
    return this;
  }

  type(type: ChannelType): NotificationRequestBuilder {
    this.props.type = type;
    return this;
  }

  subject(subject: string | null): NotificationRequestBuilder {
    this.props.subject = subject;
    return this;
  }

  body(body: string): NotificationRequestBuilder {
    this.props.body = body;
    return this;
  }

  to(to: string): NotificationRequestBuilder {
    this.props.to = to;
    return this;
  }

  build(): NotificationRequest {
    const { type } = this.props;
    if (type === undefined) {
      throw new NotificationRequestValidationError(
        'type cannot be null',
        'type',
        'INVALID_CHANNEL_TYPE',
      );
    }

    return NotificationRequest.create({
      tenantId: this.props.tenantId ?? '',
      organizationId: this.props.organizationId ?? '',
      siteId: this.props.siteId ?? '',
      leadId: this.props.leadId ?? '',
      type,
      subject: this.props.subject,
      body: this.props.body ?? '',
      to: this.props.to ?? '',
    });
  }
}
