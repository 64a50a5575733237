import { Logger } from '@nestjs/common';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';
import {
  DeliveryOutcome,
  NotificationChannelPort,
} from '../interfaces/channel.interface';
import { deliveryFailure } from '../delivery-outcome';

export abstract class BaseChannel implements NotificationChannelPort {
  abstract readonly name: string;
  protected abstract readonly supportedTypes: ReadonlySet<ChannelType>;
  protected readonly logger: Logger;

  constructor() {
    this.logger = new Logger(this.constructor.name);
  }

  supports(type: ChannelType): boolean {
    return this.supportedTypes.has(type);
  }

  async send(request: NotificationRequest | null): Promise<DeliveryOutcome> {
    if (!request) {
      return deliveryFailure(this.name, 'notification was null');
    }

    if (!this.supports(request.type)) {
      return deliveryFailure(this.name, `unsupported type: ${request.type}`);
    }

    try {
      return await this.deliver(request);
    } catch (error) {
      this.logger.error(
        `Delivery via ${this.name} threw for lead ${request.leadId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return deliveryFailure(
        this.name,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Hand the request to the vendor. Only called with a supported type.
   */
  protected abstract deliver(
    request: NotificationRequest,
  ): Promise<DeliveryOutcome>;
}
