/**
 * ChannelReconciler - keeps the renderer's channel registry in sync with the
 * desired channel settings
 */

import { ChannelSettings, NotificationChannel, isSameChannel } from '../models';
import { LocalNotificationRenderer } from '../platform';
import { createLogger, Logger } from '../utils/logger';

export interface ReconciliationPlan {
  toCreate: NotificationChannel[];
  toDelete: NotificationChannel[];
  /** Stale channels kept because their name equals the default channel id */
  retained: NotificationChannel[];
}

export interface ReconciliationResult {
  supported: boolean;
  created: string[];
  deleted: string[];
  retained: string[];
}

/**
 * Computes the creates and deletes that turn `current` into `desired`.
 *
 * Stale channels whose *name* equals the default channel *id* are retained.
 * This compares a name with an id and is kept as-is until the intended
 * comparison is confirmed (see DESIGN.md).
 */
export const planReconciliation = (
  desired: ChannelSettings,
  current: NotificationChannel[],
): ReconciliationPlan => {
  const wanted = [desired.defaultChannel, ...desired.channels];
  const wantedIds = new Set(wanted.map((channel) => channel.id));

  const toCreate = wanted.filter(
    (channel) =>
      !current.some((existing) => isSameChannel(existing, channel)),
  );

  const stale = current.filter((channel) => !wantedIds.has(channel.id));
  const retained = stale.filter(
    (channel) => channel.name === desired.defaultChannel.id,
  );
  const toDelete = stale.filter(
    (channel) => channel.name !== desired.defaultChannel.id,
  );

  return { toCreate, toDelete, retained };
};

export class ChannelReconciler {
  private logger: Logger;

  constructor(private renderer: LocalNotificationRenderer) {
    this.logger = createLogger('ChannelReconciler');
  }

  /**
   * Creates missing channels and deletes channels that are no longer desired.
   * A no-op on platforms without notification channels.
   */
  async reconcile(desired: ChannelSettings): Promise<ReconciliationResult> {
    const capability = this.renderer.channelCapability();
    if (capability.kind === 'unsupported') {
      this.logger.debug('Channel management not supported, skipping', {
        platform: this.renderer.platform,
      });
      return { supported: false, created: [], deleted: [], retained: [] };
    }

    const manager = capability.channels;
    const current = await manager.getNotificationChannels();
    const plan = planReconciliation(desired, current);

    for (const channel of plan.toCreate) {
      await manager.createNotificationChannel(channel);
    }

    for (const channel of plan.toDelete) {
      await manager.deleteNotificationChannel(channel.id);
    }

    if (plan.retained.length > 0) {
      this.logger.warn('Kept stale channels named after the default channel id', {
        defaultChannelId: desired.defaultChannel.id,
        channelIds: plan.retained.map((channel) => channel.id),
      });
    }

    const result: ReconciliationResult = {
      supported: true,
      created: plan.toCreate.map((channel) => channel.id),
      deleted: plan.toDelete.map((channel) => channel.id),
      retained: plan.retained.map((channel) => channel.id),
    };

    this.logger.info('Notification channels reconciled', {
      created: result.created,
      deleted: result.deleted,
    });

    return result;
  }
}
