export type NotificationRequestErrorCode = 'BLANK_FIELD' | 'INVALID_CHANNEL_TYPE';

export class NotificationRequestValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly code: NotificationRequestErrorCode = 'BLANK_FIELD',
  ) {
    super(message);
    this.name = 'NotificationRequestValidationError';
  }
}
