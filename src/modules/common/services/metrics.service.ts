import { Injectable, Logger } from '@nestjs/common';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';

export interface ChannelDeliveryStats {
  sent: number;
  failed: number;
}

interface MetricsState {
  routesSucceeded: number;
  routesFailed: number;
  rateLimited: number;
  attemptTimes: number[];
  channelStats: Map<string, ChannelDeliveryStats>;
}

export interface DeliveryMetrics {
  routesSucceeded: number;
  routesFailed: number;
  rateLimited: number;
  averageAttemptTime: number;
  successRate: number;
  channelBreakdown: Record<string, ChannelDeliveryStats>;
}

@Injectable()
export class DeliveryMetricsService {
  private readonly logger = new Logger(DeliveryMetricsService.name);

  // In-memory only; counters reset with the process
  private metrics = this.emptyMetrics();

  recordChannelDelivery(
    channel: string,
    success: boolean,
    duration: number,
  ): void {
    this.logger.debug(
      `Channel delivery: ${channel}, success: ${success}, duration: ${duration}ms`,
    );

    const channelStats = this.metrics.channelStats.get(channel) ?? {
      sent: 0,
      failed: 0,
    };
    if (success) {
      channelStats.sent++;
    } else {
      channelStats.failed++;
    }
    this.metrics.channelStats.set(channel, channelStats);

    this.metrics.attemptTimes.push(duration);
    if (
      this.metrics.attemptTimes.length >
      APP_CONSTANTS.PERFORMANCE.MAX_ATTEMPT_TIMES_STORED
    ) {
      this.metrics.attemptTimes = this.metrics.attemptTimes.slice(
        -APP_CONSTANTS.PERFORMANCE.MAX_ATTEMPT_TIMES_STORED,
      );
    }
  }

  recordRouteOutcome(success: boolean): void {
    if (success) {
      this.metrics.routesSucceeded++;
    } else {
      this.metrics.routesFailed++;
    }
  }

  recordRateLimited(): void {
    this.metrics.rateLimited++;
  }

  getMetrics(): DeliveryMetrics {
    const { routesSucceeded, routesFailed, rateLimited, attemptTimes } =
      this.metrics;
    const total = routesSucceeded + routesFailed;

    const averageAttemptTime =
      attemptTimes.length > 0
        ? attemptTimes.reduce((sum, time) => sum + time, 0) /
          attemptTimes.length
        : 0;
    const successRate = total > 0 ? (routesSucceeded / total) * 100 : 0;

    const channelBreakdown: Record<string, ChannelDeliveryStats> = {};
    this.metrics.channelStats.forEach((stats, channel) => {
      channelBreakdown[channel] = { ...stats };
    });

    return {
      routesSucceeded,
      routesFailed,
      rateLimited,
      averageAttemptTime: Math.round(averageAttemptTime),
      successRate: Math.round(successRate * 100) / 100, // Round to 2 decimal places
      channelBreakdown,
    };
  }

  reset(): void {
    this.metrics = this.emptyMetrics();
    this.logger.log('Delivery metrics reset');
  }

  private emptyMetrics(): MetricsState {
    return {
      routesSucceeded: 0,
      routesFailed: 0,
      rateLimited: 0,
      attemptTimes: [],
      channelStats: new Map<string, ChannelDeliveryStats>(),
    };
  }
}
