import { ChannelConfigurationError } from '../exceptions/channel.exceptions';

/**
 * In-memory send counter keyed by tenant + lead + day.
 *
 * tryReserve and release are plain synchronous read-modify-writes on the map;
 * callers must not await between deciding to reserve and calling tryReserve.
 * Entries are never evicted.
 */
export class DailyRateLimitLedger {
  private readonly counts = new Map<string, number>();

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ChannelConfigurationError(
        `rate limit must be a positive integer, got ${limit}`,
      );
    }
  }

  /**
   * Take a slot for the key. Returns false, leaving the count untouched, when
   * the key is already at the limit.
   */
  tryReserve(key: string): boolean {
    const current = this.counts.get(key) ?? 0;
    if (current >= this.limit) {
      return false;
    }
    this.counts.set(key, current + 1);
    return true;
  }

  release(key: string): void {
    const current = this.counts.get(key) ?? 0;
    this.counts.set(key, Math.max(0, current - 1));
  }

  count(key: string): number {
    return this.counts.get(key) ?? 0;
  }
}
