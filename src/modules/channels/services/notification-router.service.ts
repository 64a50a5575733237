import { Logger } from '@nestjs/common';
import { format } from 'date-fns';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { Clock, SystemClock } from '../../../common/services/clock.service';
import { DeliveryMetricsService } from '../../common/services/metrics.service';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';
import {
  DeliveryFailure,
  DeliveryOutcome,
  NotificationChannelPort,
} from '../interfaces/channel.interface';
import { deliveryFailure } from '../delivery-outcome';
import { ChannelConfigurationError } from '../exceptions/channel.exceptions';
import { DailyRateLimitLedger } from './daily-rate-limit.ledger';

export interface NotificationRouterOptions {
  maxPerLeadPerDay?: number;
}

const ROUTER_VENDOR = APP_CONSTANTS.VENDORS.ROUTER;

/**
 * Routes a notification through channels in priority order.
 *
 * Each call reserves one of the lead's daily slots before trying any channel.
 * The first successful channel wins and keeps the slot; if every capable
 * channel fails the slot is handed back. route() always resolves with an
 * outcome, never rejects for delivery problems.
 */
export class NotificationRouter {
  private readonly logger = new Logger(NotificationRouter.name);
  private readonly channels: readonly NotificationChannelPort[];
  private readonly ledger: DailyRateLimitLedger;

  constructor(
    channels: readonly NotificationChannelPort[],
    private readonly clock: Clock = new SystemClock(),
    options: NotificationRouterOptions = {},
    private readonly metrics?: DeliveryMetricsService,
  ) {
    if (!channels || channels.length === 0) {
      throw new ChannelConfigurationError('channels cannot be null/empty');
    }
    this.channels = [...channels];
    this.ledger = new DailyRateLimitLedger(
      options.maxPerLeadPerDay ??
        APP_CONSTANTS.RATE_LIMIT.MAX_NOTIFICATIONS_PER_LEAD_PER_DAY,
    );
    this.logger.log(
      `Routing across ${this.channels.length} channel(s): ${this.channels
        .map((channel) => channel.name)
        .join(' > ')}`,
    );
  }

  async route(
    request: NotificationRequest | null | undefined,
  ): Promise<DeliveryOutcome> {
    if (!request) {
      this.logger.warn('Rejected route call without a notification');
      return deliveryFailure(ROUTER_VENDOR, 'notification was null');
    }

    // Reserve before the first await so concurrent calls cannot both pass
    const rateKey = this.rateLimitKey(request.tenantId, request.leadId);
    if (!this.ledger.tryReserve(rateKey)) {
      this.metrics?.recordRateLimited();
      this.logger.warn(
        `Rate limit reached for lead ${request.leadId} of tenant ${request.tenantId}`,
      );
      return deliveryFailure(
        ROUTER_VENDOR,
        `rate limit exceeded (max ${this.ledger.limit} per lead per day)`,
      );
    }

    let lastFailure: DeliveryFailure | undefined;

    for (const channel of this.channels) {
      if (!channel.supports(request.type)) {
        continue;
      }

      this.logger.debug(
        `Trying ${channel.name} for ${request.type} notification to lead ${request.leadId}`,
      );
      const outcome = await this.attempt(channel, request);

      if (outcome.success) {
        this.metrics?.recordRouteOutcome(true);
        this.logger.log(
          `Delivered ${request.type} notification to lead ${request.leadId} via ${outcome.vendor} (${outcome.trackingId})`,
        );
        return outcome;
      }

      lastFailure = outcome;
      this.logger.warn(
        `Delivery via ${outcome.vendor} failed for lead ${request.leadId}: ${outcome.error}`,
      );
    }

    // Nothing went out: give the slot back
    this.ledger.release(rateKey);
    this.metrics?.recordRouteOutcome(false);

    if (lastFailure) {
      return lastFailure;
    }
    this.logger.warn(`No channel supports ${request.type} notifications`);
    return deliveryFailure(
      ROUTER_VENDOR,
      `no channel supports type: ${request.type}`,
    );
  }

  /**
   * Slots already used today by the lead, including attempts still in flight
   */
  getUsageToday(tenantId: string, leadId: string): number {
    return this.ledger.count(this.rateLimitKey(tenantId, leadId));
  }

  getRemainingToday(tenantId: string, leadId: string): number {
    return Math.max(0, this.ledger.limit - this.getUsageToday(tenantId, leadId));
  }

  private async attempt(
    channel: NotificationChannelPort,
    request: NotificationRequest,
  ): Promise<DeliveryOutcome> {
    const startTime = Date.now();
    let outcome: DeliveryOutcome;

    try {
      outcome = await channel.send(request);
    } catch (error) {
      // Channels are expected to resolve with failures; treat a rejection as one
      this.logger.error(
        `Channel ${channel.name} threw while sending`,
        error instanceof Error ? error.stack : String(error),
      );
      outcome = deliveryFailure(
        channel.name,
        error instanceof Error ? error.message : String(error),
      );
    }

    this.metrics?.recordChannelDelivery(
      channel.name,
      outcome.success,
      Date.now() - startTime,
    );
    return outcome;
  }

  private rateLimitKey(tenantId: string, leadId: string): string {
    const day = format(
      this.clock.now(),
      APP_CONSTANTS.RATE_LIMIT.DAY_KEY_FORMAT,
    );
    // identifiers may contain any separator, so encode the tuple
    return JSON.stringify([tenantId, leadId, day]);
  }
}
