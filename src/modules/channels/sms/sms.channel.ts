import { randomUUID } from 'crypto';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { DeliveryOutcome } from '../interfaces/channel.interface';
import { BaseChannel } from '../base/base.channel';
import { deliveryFailure, deliverySuccess } from '../delivery-outcome';

export interface SmsChannelOptions {
  /** Every send fails as if the vendor were down */
  simulateFailure?: boolean;
}

// E.164 after formatting characters are stripped
const PHONE_PATTERN = /^\+?[1-9]\d{1,14}$/;

export class SmsChannel extends BaseChannel {
  readonly name: string = APP_CONSTANTS.VENDORS.SMS;
  protected readonly supportedTypes: ReadonlySet<ChannelType> = new Set([
    ChannelType.SMS,
  ]);
  private readonly simulateFailure: boolean;

  constructor(options: SmsChannelOptions = {}) {
    super();
    this.simulateFailure = options.simulateFailure ?? false;
  }

  protected async deliver(
    request: NotificationRequest,
  ): Promise<DeliveryOutcome> {
    // an unreachable vendor never gets to look at the number
    if (this.simulateFailure) {
      return deliveryFailure(this.name, 'simulated SMS vendor failure');
    }

    const phone = request.to.replace(/[\s\-()]/g, '');
    if (!PHONE_PATTERN.test(phone)) {
      return deliveryFailure(this.name, `invalid recipient for sms: ${request.to}`);
    }

    const trackingId = `sms-${randomUUID()}`;
    this.logger.debug(
      `Accepted sms notification for lead ${request.leadId} as ${trackingId}`,
    );
    return deliverySuccess(this.name, trackingId);
  }
}
