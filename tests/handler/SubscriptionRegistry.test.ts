/**
 * Tests for SubscriptionRegistry
 */

import { SubscriptionRegistry } from '../../src/handler/SubscriptionRegistry';

describe('SubscriptionRegistry', () => {
  let registry: SubscriptionRegistry;
  let listeners: Array<(event: string) => void>;
  let unsubscribed: number;

  const subscribe = (listener: (event: string) => void) => {
    listeners.push(listener);
    return () => {
      unsubscribed += 1;
    };
  };

  beforeEach(() => {
    registry = new SubscriptionRegistry();
    listeners = [];
    unsubscribed = 0;
  });

  it('bumps the generation on every registration', () => {
    const first = registry.register('foreground', subscribe, jest.fn());
    const second = registry.register('foreground', subscribe, jest.fn());

    expect(first).toBe(1);
    expect(second).toBe(2);
    expect(unsubscribed).toBe(1);
    expect(registry.generationOf('opened')).toBe(0);
  });

  it('delivers events to the current subscription', async () => {
    const handle = jest.fn();
    const generation = registry.register('foreground', subscribe, handle);

    await registry.dispatch({ slot: 'foreground', generation }, 'event', handle);

    expect(handle).toHaveBeenCalledWith('event', {
      slot: 'foreground',
      generation,
    });
  });

  it('drops events for a stale generation', async () => {
    const stale = jest.fn();
    const current = jest.fn();
    const staleGeneration = registry.register('foreground', subscribe, stale);
    registry.register('foreground', subscribe, current);

    await registry.dispatch(
      { slot: 'foreground', generation: staleGeneration },
      'late event',
      stale,
    );

    expect(stale).not.toHaveBeenCalled();
  });

  it('drops events after the slot is cancelled', async () => {
    const handle = jest.fn();
    const generation = registry.register('opened', subscribe, handle);

    registry.cancel('opened');
    await registry.dispatch({ slot: 'opened', generation }, 'event', handle);

    expect(handle).not.toHaveBeenCalled();
    expect(unsubscribed).toBe(1);
  });

  it('contains handler failures', async () => {
    const handle = jest.fn().mockRejectedValue(new Error('handler failed'));
    const generation = registry.register('foreground', subscribe, handle);

    await expect(
      registry.dispatch({ slot: 'foreground', generation }, 'event', handle),
    ).resolves.toBeUndefined();
  });

  it('cancels every slot', () => {
    registry.register('foreground', subscribe, jest.fn());
    registry.register('opened', subscribe, jest.fn());

    registry.cancelAll();

    expect(unsubscribed).toBe(2);
    expect(registry.isCurrent({ slot: 'foreground', generation: 1 })).toBe(false);
    expect(registry.isCurrent({ slot: 'opened', generation: 1 })).toBe(false);
  });
});
