/**
 * Raised while wiring channels, breakers or the router.
 * Never raised for a failed delivery: those are returned as outcomes.
 */
export class ChannelConfigurationError extends Error {
  public readonly code = 'INVALID_CHANNEL_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'ChannelConfigurationError';
  }
}
