import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import * as EmailValidator from 'email-validator';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { DeliveryOutcome } from '../interfaces/channel.interface';
import { BaseChannel } from '../base/base.channel';
import { deliveryFailure, deliverySuccess } from '../delivery-outcome';

/**
 * Email channel. Also accepts SMS requests so it can act as an
 * email-to-SMS gateway fallback behind the SMS vendor.
 */
@Injectable()
export class EmailChannel extends BaseChannel {
  readonly name: string = APP_CONSTANTS.VENDORS.EMAIL;
  protected readonly supportedTypes: ReadonlySet<ChannelType> = new Set([
    ChannelType.EMAIL,
    ChannelType.SMS,
  ]);

  protected async deliver(
    request: NotificationRequest,
  ): Promise<DeliveryOutcome> {
    if (
      request.type === ChannelType.EMAIL &&
      !EmailValidator.validate(request.to)
    ) {
      return deliveryFailure(
        this.name,
        `invalid recipient for email: ${request.to}`,
      );
    }

    // Vendor hand-off is simulated; the tracking id is ours
    const trackingId = `email-${randomUUID()}`;
    this.logger.debug(
      `Accepted ${request.type} notification for lead ${request.leadId} as ${trackingId}`,
    );
    return deliverySuccess(this.name, trackingId);
  }
}
