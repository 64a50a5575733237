import { DeliveryFailure, DeliverySuccess } from './interfaces/channel.interface';

export function deliverySuccess(
  vendor: string,
  trackingId: string,
  deliveredAt: Date = new Date(),
): DeliverySuccess {
  const outcome: DeliverySuccess = {
    success: true,
    vendor,
    trackingId,
    deliveredAt,
  };
  return Object.freeze(outcome);
}

export function deliveryFailure(vendor: string, error: string): DeliveryFailure {
  const outcome: DeliveryFailure = { success: false, vendor, error };
  return Object.freeze(outcome);
}
