import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';

export interface DeliverySuccess {
  readonly success: true;
  readonly vendor: string;
  readonly trackingId: string;
  readonly deliveredAt: Date;
}

export interface DeliveryFailure {
  readonly success: false;
  readonly vendor: string;
  readonly error: string;
}

export type DeliveryOutcome = DeliverySuccess | DeliveryFailure;

/**
 * Contract every delivery channel implements.
 * send() resolves with a failure outcome for ordinary delivery problems and
 * should not reject.
 */
export interface NotificationChannelPort {
  readonly name: string;
  supports(type: ChannelType): boolean;
  send(request: NotificationRequest | null): Promise<DeliveryOutcome>;
}

export const CHANNEL_NAMES = ['sms', 'email'] as const;

export type ChannelName = (typeof CHANNEL_NAMES)[number];

export function isChannelName(value: string): value is ChannelName {
  return CHANNEL_NAMES.some((name) => name === value);
}
