/**
 * MessageMapper - turns remote messages into local notification parameters
 */

import {
  AndroidNotificationDetails,
  AndroidNotificationFields,
  AndroidNotificationPriority,
  AndroidNotificationVisibility,
  AppleNotificationFields,
  ChannelSettings,
  DarwinNotificationDetails,
  Importance,
  NotificationChannel,
  NotificationVisibility,
  Priority,
  RemoteMessage,
  ResolvedNotificationParameters,
} from '../models';
import { MalformedBadgeError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { notificationIdFor } from '../utils/notificationId';

// Sound value that selects the platform's built-in sound
export const DEFAULT_SOUND = 'default';

export const PRIORITY_MAP: Record<AndroidNotificationPriority, Priority> = {
  minimum: 'min',
  low: 'low',
  default: 'default',
  high: 'high',
  maximum: 'max',
};

export const IMPORTANCE_MAP: Record<AndroidNotificationPriority, Importance> = {
  minimum: 'min',
  low: 'low',
  default: 'default',
  high: 'high',
  maximum: 'max',
};

export const VISIBILITY_MAP: Record<
  AndroidNotificationVisibility,
  NotificationVisibility
> = {
  private: 'private',
  public: 'public',
  secret: 'secret',
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const parseBadge = (badge: string, messageId?: string): number => {
  if (!INTEGER_PATTERN.test(badge)) {
    throw new MalformedBadgeError(badge, messageId);
  }
  const value = Number.parseInt(badge, 10);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedBadgeError(badge, messageId);
  }
  return value;
};

export class MessageMapper {
  private logger: Logger;

  constructor() {
    this.logger = createLogger('MessageMapper');
  }

  /**
   * Resolves the display parameters for `message`, or `null` when the message
   * has no title and must not be shown.
   *
   * @param knownChannels - the renderer's channel registry; a best-effort
   * snapshot, unknown channel ids fall back to the default channel
   * @throws MalformedBadgeError if the Apple badge is not an integer string
   */
  mapToLocalNotification(
    message: RemoteMessage,
    channelSettings: ChannelSettings,
    knownChannels: NotificationChannel[] = [],
  ): ResolvedNotificationParameters | null {
    const notification = message.notification;
    const title = notification?.title ?? message.data['title'];

    if (title === undefined) {
      this.logger.debug('Message has no title, notification suppressed', {
        messageId: message.messageId,
      });
      return null;
    }

    const android = notification?.android
      ? this.getAndroidDetails(notification.android, channelSettings, knownChannels)
      : undefined;

    const apple = notification?.apple
      ? this.getDarwinDetails(notification.apple, message.messageId)
      : undefined;

    return {
      id: notificationIdFor(message.messageId),
      title,
      body: notification?.body ?? message.data['body'],
      android,
      apple,
      data: message.data,
    };
  }

  private getAndroidDetails(
    fields: AndroidNotificationFields,
    channelSettings: ChannelSettings,
    knownChannels: NotificationChannel[],
  ): AndroidNotificationDetails {
    const channel = this.resolveChannel(
      fields.channelId,
      channelSettings,
      knownChannels,
    );
    const sound = fields.sound;

    return {
      channelId: channel.id,
      channelName: channel.name,
      playSound: sound !== undefined,
      sound: sound !== undefined && sound !== DEFAULT_SOUND ? sound : undefined,
      importance: fields.priority ? IMPORTANCE_MAP[fields.priority] : 'default',
      priority: fields.priority ? PRIORITY_MAP[fields.priority] : 'default',
      visibility: fields.visibility
        ? VISIBILITY_MAP[fields.visibility]
        : undefined,
      icon: fields.smallIcon,
      tag: fields.tag,
      ticker: fields.ticker,
    };
  }

  private getDarwinDetails(
    fields: AppleNotificationFields,
    messageId?: string,
  ): DarwinNotificationDetails {
    const soundName = fields.sound?.name;

    return {
      presentSound: fields.sound !== undefined,
      sound:
        soundName !== undefined && soundName !== DEFAULT_SOUND
          ? soundName
          : undefined,
      presentBadge: fields.badge !== undefined,
      badgeNumber:
        fields.badge !== undefined
          ? parseBadge(fields.badge, messageId)
          : undefined,
    };
  }

  private resolveChannel(
    channelId: string | undefined,
    channelSettings: ChannelSettings,
    knownChannels: NotificationChannel[],
  ): NotificationChannel {
    if (channelId !== undefined) {
      const known = knownChannels.find((channel) => channel.id === channelId);
      if (known) {
        return known;
      }
      this.logger.debug('Unknown channel, using default channel', {
        channelId,
        defaultChannelId: channelSettings.defaultChannel.id,
      });
    }
    return channelSettings.defaultChannel;
  }
}
