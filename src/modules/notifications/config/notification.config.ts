import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { validateEnv } from '../../../common/utils/validation.util';
import {
  CHANNEL_NAMES,
  ChannelName,
  isChannelName,
} from '../../channels/interfaces/channel.interface';

export interface NotificationConfig {
  maxPerLeadPerDay: number;
  /** Highest priority first */
  channelPriority: ChannelName[];
}

interface ValidatedNotificationEnv {
  NOTIFICATION_MAX_PER_LEAD_PER_DAY: number;
  NOTIFICATION_CHANNEL_PRIORITY: string;
}

const channelList = new RegExp(
  `^(${CHANNEL_NAMES.join('|')})(,(${CHANNEL_NAMES.join('|')}))*$`,
);

const notificationConfigSchema = Joi.object<ValidatedNotificationEnv>({
  NOTIFICATION_MAX_PER_LEAD_PER_DAY: Joi.number()
    .integer()
    .min(1)
    .max(1000)
    .default(APP_CONSTANTS.RATE_LIMIT.MAX_NOTIFICATIONS_PER_LEAD_PER_DAY),
  NOTIFICATION_CHANNEL_PRIORITY: Joi.string()
    .lowercase()
    .replace(/\s+/g, '')
    .pattern(channelList, 'channel list')
    .default('sms,email'),
});

function parseChannelPriority(value: string): ChannelName[] {
  const priority: ChannelName[] = [];
  for (const entry of value.split(',')) {
    if (isChannelName(entry) && !priority.includes(entry)) {
      priority.push(entry);
    }
  }
  return priority;
}

export function loadNotificationConfig(
  env: Record<string, unknown>,
): NotificationConfig {
  const validatedEnv = validateEnv(
    notificationConfigSchema,
    {
      NOTIFICATION_MAX_PER_LEAD_PER_DAY: env.NOTIFICATION_MAX_PER_LEAD_PER_DAY,
      NOTIFICATION_CHANNEL_PRIORITY: env.NOTIFICATION_CHANNEL_PRIORITY,
    },
    'Notification',
  );

  return {
    maxPerLeadPerDay: validatedEnv.NOTIFICATION_MAX_PER_LEAD_PER_DAY,
    channelPriority: parseChannelPriority(
      validatedEnv.NOTIFICATION_CHANNEL_PRIORITY,
    ),
  };
}

export const notificationConfig = registerAs('notification', () =>
  loadNotificationConfig(process.env),
);
