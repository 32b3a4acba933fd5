/**
 * RemoteMessage model - inbound messages delivered by the push transport
 */

export type AndroidNotificationPriority =
  | 'minimum'
  | 'low'
  | 'default'
  | 'high'
  | 'maximum';

export type AndroidNotificationVisibility = 'private' | 'public' | 'secret';

export interface AndroidNotificationFields {
  channelId?: string;
  sound?: string;
  priority?: AndroidNotificationPriority;
  visibility?: AndroidNotificationVisibility;
  smallIcon?: string;
  tag?: string;
  ticker?: string;
}

export interface AppleNotificationSound {
  name?: string;
  critical?: boolean;
  volume?: number;
}

export interface AppleNotificationFields {
  sound?: AppleNotificationSound;
  badge?: string; // string-encoded integer
}

export interface RemoteNotification {
  title?: string;
  body?: string;
  android?: AndroidNotificationFields;
  apple?: AppleNotificationFields;
}

export interface RemoteMessage {
  messageId?: string;
  notification?: RemoteNotification;
  data: Record<string, string>;
  sentTime?: Date;
}

/**
 * A notification message carries structured notification fields; a data
 * message only carries `data` and is handled silently by the app.
 */
export const isNotificationMessage = (message: RemoteMessage): boolean =>
  message.notification !== undefined;
