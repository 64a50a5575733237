import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppConfig, resolveLogLevels } from './config';
import { NotificationRouter } from './modules/channels/services/notification-router.service';
import { NotificationRequest } from './modules/notifications/value-objects/notification-request.value-object';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  const config = app.get(ConfigService).getOrThrow<AppConfig>('app');
  app.useLogger(resolveLogLevels(config.logLevel));
  app.flushLogs();

  const logger = new Logger('Bootstrap');
  logger.log(`${config.name} v${config.version} (${config.environment})`);

  // Smoke run: one SMS through the configured channels
  const router = app.get(NotificationRouter);
  const outcome = await router.route(
    NotificationRequest.sms({
      tenantId: 'tenant-demo',
      organizationId: 'org-demo',
      siteId: 'site-demo',
      leadId: 'lead-demo',
      body: 'Your test drive is confirmed for tomorrow at 10am',
      to: '+14155550123',
    }),
  );

  if (outcome.success) {
    logger.log(`Delivered via ${outcome.vendor} (${outcome.trackingId})`);
  } else {
    logger.warn(`Not delivered (${outcome.vendor}): ${outcome.error}`);
  }

  await app.close();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Bootstrap failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
