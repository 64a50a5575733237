import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock, SystemClock } from '../../common/services/clock.service';
import { DeliveryMetricsService } from '../common/services/metrics.service';
import { NotificationConfig } from '../notifications/config/notification.config';
import { ChannelsConfig } from './config/channels.config';
import { EmailChannel } from './email/email.channel';
import { SmsChannel } from './sms/sms.channel';
import { ChannelRegistry } from './services/channel-registry.service';
import { NotificationRouter } from './services/notification-router.service';

@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    DeliveryMetricsService,
    EmailChannel,
    {
      provide: SmsChannel,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        new SmsChannel({
          simulateFailure:
            configService.getOrThrow<ChannelsConfig>('channels').sms
              .simulateFailure,
        }),
    },
    ChannelRegistry,
    {
      provide: NotificationRouter,
      inject: [ChannelRegistry, ConfigService, CLOCK, DeliveryMetricsService],
      useFactory: (
        registry: ChannelRegistry,
        configService: ConfigService,
        clock: Clock,
        metrics: DeliveryMetricsService,
      ) =>
        new NotificationRouter(
          registry.getChannelsInPriorityOrder(),
          clock,
          {
            maxPerLeadPerDay:
              configService.getOrThrow<NotificationConfig>('notification')
                .maxPerLeadPerDay,
          },
          metrics,
        ),
    },
  ],
  exports: [NotificationRouter, ChannelRegistry, DeliveryMetricsService],
})
export class ChannelsModule {}
