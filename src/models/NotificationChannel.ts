/**
 * NotificationChannel model - Android notification channels and their settings
 */

export type Importance =
  | 'unspecified'
  | 'none'
  | 'min'
  | 'low'
  | 'default'
  | 'high'
  | 'max';

export interface NotificationChannel {
  id: string;
  name: string;
  importance: Importance;
  description?: string;
  playSound?: boolean;
  enableVibration?: boolean;
  showBadge?: boolean;
}

export interface ChannelSettings {
  defaultChannel: NotificationChannel;
  channels: NotificationChannel[];
}

export interface AndroidNotificationSettings {
  /**
   * Must match the `com.google.firebase.messaging.default_notification_icon`
   * meta-data value in AndroidManifest.xml.
   */
  defaultNotificationIcon: string;
  notificationChannelSettings: ChannelSettings;
}

export const DEFAULT_CHANNEL_ID = 'default';
export const DEFAULT_CHANNEL_NAME = 'General Notifications';
export const DEFAULT_NOTIFICATION_ICON = 'ic_default_push_notification';

export const createDefaultChannelSettings = (
  overrides: Partial<ChannelSettings> = {},
): ChannelSettings => ({
  defaultChannel: {
    id: DEFAULT_CHANNEL_ID,
    name: DEFAULT_CHANNEL_NAME,
    importance: 'max',
  },
  channels: [],
  ...overrides,
});

export const createAndroidNotificationSettings = (
  overrides: Partial<AndroidNotificationSettings> = {},
): AndroidNotificationSettings => ({
  defaultNotificationIcon: DEFAULT_NOTIFICATION_ICON,
  notificationChannelSettings: createDefaultChannelSettings(),
  ...overrides,
});

// Whether the registry entry `existing` already satisfies `desired`. Optional
// fields left unset on `desired` match whatever the renderer filled in.
export const isSameChannel = (
  existing: NotificationChannel,
  desired: NotificationChannel,
): boolean =>
  existing.id === desired.id &&
  existing.name === desired.name &&
  existing.importance === desired.importance &&
  (desired.description === undefined ||
    existing.description === desired.description) &&
  (desired.playSound === undefined ||
    existing.playSound === desired.playSound) &&
  (desired.enableVibration === undefined ||
    existing.enableVibration === desired.enableVibration) &&
  (desired.showBadge === undefined || existing.showBadge === desired.showBadge);
