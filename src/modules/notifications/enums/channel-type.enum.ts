export enum ChannelType {
  EMAIL = 'email',
  SMS = 'sms',
  PUSH = 'push',
}

export function isChannelType(value: unknown): value is ChannelType {
  return Object.values(ChannelType).some((type) => type === value);
}
