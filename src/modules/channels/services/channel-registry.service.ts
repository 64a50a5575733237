import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK } from '../../../common/services/clock.service';
import type { Clock } from '../../../common/services/clock.service';
import { NotificationConfig } from '../../notifications/config/notification.config';
import { ChannelsConfig } from '../config/channels.config';
import { EmailChannel } from '../email/email.channel';
import { SmsChannel } from '../sms/sms.channel';
import {
  ChannelName,
  NotificationChannelPort,
  isChannelName,
} from '../interfaces/channel.interface';
import { CircuitBreaker } from '../circuit-breaker/circuit-breaker';
import { CircuitGuardedChannel } from '../circuit-breaker/circuit-breaker.channel';
import { CircuitState } from '../circuit-breaker/circuit-breaker.state';

export interface CircuitStats {
  state: CircuitState;
  failureCount: number;
}

/**
 * Builds the priority-ordered channel list the router consumes, giving each
 * enabled channel its own circuit breaker.
 */
@Injectable()
export class ChannelRegistry {
  private readonly logger = new Logger(ChannelRegistry.name);
  private readonly breakers = new Map<ChannelName, CircuitBreaker>();
  private readonly channels: NotificationChannelPort[];

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(EmailChannel) emailChannel: EmailChannel,
    @Inject(SmsChannel) smsChannel: SmsChannel,
  ) {
    this.channels = this.registerChannels({
      email: emailChannel,
      sms: smsChannel,
    });
  }

  /**
   * Highest priority first
   */
  getChannelsInPriorityOrder(): NotificationChannelPort[] {
    return [...this.channels];
  }

  getCircuitStats(): Partial<Record<ChannelName, CircuitStats>> {
    const stats: Partial<Record<ChannelName, CircuitStats>> = {};
    for (const [name, breaker] of this.breakers) {
      stats[name] = {
        state: breaker.getState(),
        failureCount: breaker.getFailureCount(),
      };
    }
    return stats;
  }

  /**
   * Operator action: force a channel's circuit closed.
   * Returns false when the channel has no breaker.
   */
  resetCircuit(name: string): boolean {
    const breaker = isChannelName(name) ? this.breakers.get(name) : undefined;
    if (!breaker) {
      return false;
    }
    breaker.reset();
    this.logger.log(`Circuit for ${name} reset by operator`);
    return true;
  }

  private registerChannels(
    available: Record<ChannelName, NotificationChannelPort>,
  ): NotificationChannelPort[] {
    const { channelPriority } =
      this.configService.getOrThrow<NotificationConfig>('notification');
    const channelsConfig =
      this.configService.getOrThrow<ChannelsConfig>('channels');

    const registered: NotificationChannelPort[] = [];
    for (const name of channelPriority) {
      if (!channelsConfig[name].enabled) {
        this.logger.log(`Channel ${name} disabled by configuration`);
        continue;
      }
      registered.push(this.guard(name, available[name], channelsConfig));
      this.logger.log(`Registered channel: ${name}`);
    }

    this.logger.log(`Registered ${registered.length} notification channels`);
    return registered;
  }

  private guard(
    name: ChannelName,
    channel: NotificationChannelPort,
    config: ChannelsConfig,
  ): NotificationChannelPort {
    if (!config.circuitBreaker.enabled) {
      return channel;
    }
    const breaker = new CircuitBreaker(name, {
      failureThreshold: config.circuitBreaker.failureThreshold,
      openTimeoutMs: config.circuitBreaker.openTimeoutMs,
      clock: this.clock,
    });
    this.breakers.set(name, breaker);
    return new CircuitGuardedChannel(channel, breaker);
  }
}
