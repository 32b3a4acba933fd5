/**
 * Tests for ChannelReconciler
 */

import {
  ChannelReconciler,
  planReconciliation,
} from '../../src/services/ChannelReconciler';
import {
  ChannelSettings,
  NotificationChannel,
  createDefaultChannelSettings,
} from '../../src/models';
import { FakeNotificationRenderer } from '../helpers/FakeNotificationRenderer';

const promo: NotificationChannel = {
  id: 'promo',
  name: 'Promotions',
  importance: 'high',
};

const news: NotificationChannel = {
  id: 'news',
  name: 'News',
  importance: 'default',
};

const defaultChannel: NotificationChannel = {
  id: 'default',
  name: 'General Notifications',
  importance: 'max',
};

describe('planReconciliation', () => {
  it('plans the default and additional channels for an empty registry', () => {
    const plan = planReconciliation(
      createDefaultChannelSettings({ channels: [promo, news] }),
      [],
    );

    expect(plan.toCreate.map((channel) => channel.id)).toEqual([
      'default',
      'promo',
      'news',
    ]);
    expect(plan.toDelete).toEqual([]);
    expect(plan.retained).toEqual([]);
  });

  it('skips channels that already match and re-creates changed ones', () => {
    const plan = planReconciliation(
      createDefaultChannelSettings({ channels: [promo] }),
      [defaultChannel, { ...promo, name: 'Old promotions' }],
    );

    expect(plan.toCreate).toEqual([promo]);
    expect(plan.toDelete).toEqual([]);
  });

  it('deletes channels that are not desired', () => {
    const plan = planReconciliation(createDefaultChannelSettings(), [
      defaultChannel,
      news,
    ]);

    expect(plan.toCreate).toEqual([]);
    expect(plan.toDelete).toEqual([news]);
  });

  it('retains a stale channel whose name equals the default channel id', () => {
    const legacy: NotificationChannel = {
      id: 'legacy',
      name: 'default',
      importance: 'low',
    };

    const plan = planReconciliation(createDefaultChannelSettings(), [
      defaultChannel,
      legacy,
      news,
    ]);

    expect(plan.toDelete).toEqual([news]);
    expect(plan.retained).toEqual([legacy]);
  });

  it('does not retain a stale channel whose id merely equals the default name', () => {
    const channel: NotificationChannel = {
      id: 'General Notifications',
      name: 'Something else',
      importance: 'low',
    };

    const plan = planReconciliation(createDefaultChannelSettings(), [channel]);

    expect(plan.toDelete).toEqual([channel]);
  });
});

describe('ChannelReconciler', () => {
  const desired: ChannelSettings = createDefaultChannelSettings({
    channels: [promo, news],
  });

  it('creates missing channels on Android', async () => {
    const renderer = new FakeNotificationRenderer('android');
    const reconciler = new ChannelReconciler(renderer);

    const result = await reconciler.reconcile(desired);

    expect(result).toEqual({
      supported: true,
      created: ['default', 'promo', 'news'],
      deleted: [],
      retained: [],
    });
    expect(renderer.channelIds).toEqual(['default', 'news', 'promo']);
  });

  it('makes the registry equal to the desired channels', async () => {
    const old: NotificationChannel = {
      id: 'old',
      name: 'Old',
      importance: 'low',
    };
    const renderer = new FakeNotificationRenderer('android', [
      defaultChannel,
      old,
    ]);
    const reconciler = new ChannelReconciler(renderer);

    const result = await reconciler.reconcile(desired);

    expect(result.created).toEqual(['promo', 'news']);
    expect(result.deleted).toEqual(['old']);
    expect(renderer.channelIds).toEqual(['default', 'news', 'promo']);
  });

  it('updates a channel whose settings changed', async () => {
    const renderer = new FakeNotificationRenderer('android', [
      defaultChannel,
      { ...promo, importance: 'low' },
    ]);
    const reconciler = new ChannelReconciler(renderer);

    await reconciler.reconcile(createDefaultChannelSettings({ channels: [promo] }));

    expect(renderer.channel('promo')?.importance).toBe('high');
    expect(renderer.channelOps).toEqual(['create:promo']);
  });

  it('is idempotent', async () => {
    const renderer = new FakeNotificationRenderer('android', [
      { id: 'stale', name: 'Stale', importance: 'low' },
    ]);
    const reconciler = new ChannelReconciler(renderer);

    await reconciler.reconcile(desired);
    const opsAfterFirstRun = renderer.channelOps.length;
    const second = await reconciler.reconcile(desired);

    expect(second.created).toEqual([]);
    expect(second.deleted).toEqual([]);
    expect(renderer.channelOps).toHaveLength(opsAfterFirstRun);
  });

  it('is idempotent when the platform fills in channel defaults', async () => {
    const renderer = new FakeNotificationRenderer('android');
    renderer.channelDefaults = {
      description: '',
      playSound: true,
      enableVibration: true,
      showBadge: true,
    };
    const reconciler = new ChannelReconciler(renderer);

    await reconciler.reconcile(createDefaultChannelSettings());
    const second = await reconciler.reconcile(createDefaultChannelSettings());

    expect(second.created).toEqual([]);
    expect(renderer.channelOps).toEqual(['create:default']);
  });

  it('re-creates a channel whose explicit setting differs from the registry', async () => {
    const renderer = new FakeNotificationRenderer('android', [
      { ...defaultChannel, playSound: true },
    ]);
    const reconciler = new ChannelReconciler(renderer);

    const result = await reconciler.reconcile(
      createDefaultChannelSettings({
        defaultChannel: { ...defaultChannel, playSound: false },
      }),
    );

    expect(result.created).toEqual(['default']);
    expect(renderer.channel('default')?.playSound).toBe(false);
  });

  it('keeps the extra channel named after the default channel id', async () => {
    const renderer = new FakeNotificationRenderer('android', [
      { id: 'legacy', name: 'default', importance: 'low' },
    ]);
    const reconciler = new ChannelReconciler(renderer);

    const result = await reconciler.reconcile(desired);

    expect(result.retained).toEqual(['legacy']);
    expect(result.deleted).toEqual([]);
    expect(renderer.channelIds).toEqual(['default', 'legacy', 'news', 'promo']);
  });

  it('is a no-op when channels are not supported', async () => {
    const renderer = new FakeNotificationRenderer('ios');
    const reconciler = new ChannelReconciler(renderer);

    const result = await reconciler.reconcile(desired);

    expect(result).toEqual({
      supported: false,
      created: [],
      deleted: [],
      retained: [],
    });
    expect(renderer.channelOps).toEqual([]);
  });

  it('propagates renderer failures', async () => {
    const renderer = new FakeNotificationRenderer('android');
    const capability = renderer.channelCapability();
    if (capability.kind !== 'supported') {
      throw new Error('expected channel support');
    }
    jest
      .spyOn(capability.channels, 'createNotificationChannel')
      .mockRejectedValue(new Error('Renderer unavailable'));
    const reconciler = new ChannelReconciler(renderer);

    await expect(reconciler.reconcile(desired)).rejects.toThrow(
      'Renderer unavailable',
    );
  });
});
