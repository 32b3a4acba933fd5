/**
 * SubscriptionRegistry - generation-tagged listener slots.
 *
 * Replacing a slot's listener bumps its generation. Deliveries that arrive
 * for an older generation are dropped instead of reaching the new listener.
 */

import { Unsubscribe } from '../platform';
import { describeError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';

export type SubscriptionSlot = 'foreground' | 'opened';

export interface Delivery {
  slot: SubscriptionSlot;
  generation: number;
}

export type DeliveryHandler<T> = (
  event: T,
  delivery: Delivery,
) => Promise<void> | void;

export class SubscriptionRegistry {
  private logger: Logger;
  private generations = new Map<SubscriptionSlot, number>();
  private subscriptions = new Map<SubscriptionSlot, Unsubscribe>();

  constructor() {
    this.logger = createLogger('SubscriptionRegistry');
  }

  /**
   * Subscribes `handle` in `slot`, cancelling the slot's previous subscription.
   *
   * @returns the generation of the new subscription
   */
  register<T>(
    slot: SubscriptionSlot,
    subscribe: (listener: (event: T) => void) => Unsubscribe,
    handle: DeliveryHandler<T>,
  ): number {
    this.cancel(slot);

    const generation = this.generationOf(slot);
    const unsubscribe = subscribe((event) => {
      void this.dispatch({ slot, generation }, event, handle);
    });
    this.subscriptions.set(slot, unsubscribe);

    return generation;
  }

  /**
   * Cancels the slot's subscription and invalidates its pending deliveries.
   */
  cancel(slot: SubscriptionSlot): void {
    this.subscriptions.get(slot)?.();
    this.subscriptions.delete(slot);
    this.generations.set(slot, this.generationOf(slot) + 1);
  }

  cancelAll(): void {
    for (const slot of [...this.subscriptions.keys()]) {
      this.cancel(slot);
    }
  }

  generationOf(slot: SubscriptionSlot): number {
    return this.generations.get(slot) ?? 0;
  }

  isCurrent(delivery: Delivery): boolean {
    return (
      this.subscriptions.has(delivery.slot) &&
      this.generationOf(delivery.slot) === delivery.generation
    );
  }

  /**
   * Runs `handle` for a current delivery. Failures are logged per delivery so
   * one event cannot break the others.
   */
  async dispatch<T>(
    delivery: Delivery,
    event: T,
    handle: DeliveryHandler<T>,
  ): Promise<void> {
    if (!this.isCurrent(delivery)) {
      this.logger.debug('Dropping delivery for a replaced subscription', {
        slot: delivery.slot,
        generation: delivery.generation,
        current: this.generationOf(delivery.slot),
      });
      return;
    }

    try {
      await handle(event, delivery);
    } catch (error) {
      this.logger.error('Delivery handler failed', {
        slot: delivery.slot,
        generation: delivery.generation,
        error: describeError(error),
      });
    }
  }
}
