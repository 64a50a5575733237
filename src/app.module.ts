import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ChannelsModule } from './modules/channels/channels.module';
import channelsConfig from './modules/channels/config/channels.config';
import { notificationConfig } from './modules/notifications/config/notification.config';
import { appConfig, validateConfig } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateConfig,
      load: [appConfig, notificationConfig, channelsConfig],
    }),
    ChannelsModule,
  ],
})
export class AppModule {}
