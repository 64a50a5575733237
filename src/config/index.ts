export * from './config';

// Re-export common config types
export type { ConfigService } from '@nestjs/config';

export { loadNotificationConfig } from '../modules/notifications/config/notification.config';
export { loadChannelsConfig } from '../modules/channels/config/channels.config';
