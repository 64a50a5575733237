import { Logger } from '@nestjs/common';
import { ChannelType } from '../../notifications/enums/channel-type.enum';
import { NotificationRequest } from '../../notifications/value-objects/notification-request.value-object';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import {
  DeliveryOutcome,
  NotificationChannelPort,
} from '../interfaces/channel.interface';
import { deliveryFailure } from '../delivery-outcome';
import { ChannelConfigurationError } from '../exceptions/channel.exceptions';
import { CircuitBreaker } from './circuit-breaker';
import { CircuitState } from './circuit-breaker.state';

export const CIRCUIT_OPEN_ERROR =
  'Circuit is OPEN - channel unavailable (will retry after timeout)';

/**
 * Wraps any channel with a circuit breaker. While the breaker is open, sends
 * fail fast without reaching the wrapped channel.
 */
export class CircuitGuardedChannel implements NotificationChannelPort {
  private readonly logger = new Logger(CircuitGuardedChannel.name);

  constructor(
    private readonly delegate: NotificationChannelPort,
    private readonly breaker: CircuitBreaker,
  ) {
    if (!delegate) {
      throw new ChannelConfigurationError('delegate cannot be null');
    }
    if (!breaker) {
      throw new ChannelConfigurationError('circuitBreaker cannot be null');
    }
  }

  get name(): string {
    return this.delegate.name;
  }

  get circuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  supports(type: ChannelType): boolean {
    return this.delegate.supports(type);
  }

  async send(request: NotificationRequest | null): Promise<DeliveryOutcome> {
    if (!this.breaker.mayProceed()) {
      this.logger.debug(`Skipping ${this.delegate.name}: circuit is open`);
      return deliveryFailure(
        `${this.breaker.name}${APP_CONSTANTS.VENDORS.CIRCUIT_BREAKER_SUFFIX}`,
        CIRCUIT_OPEN_ERROR,
      );
    }

    let outcome: DeliveryOutcome;
    try {
      outcome = await this.delegate.send(request);
    } catch (error) {
      this.breaker.recordFailure();
      throw error;
    }

    if (outcome.success) {
      this.breaker.recordSuccess();
    } else {
      this.breaker.recordFailure();
    }
    return outcome;
  }

  getCircuitState(): CircuitState {
    return this.breaker.getState();
  }
}
