/**
 * LocalNotificationRenderer - contract of the local notification display service
 */

import { NotificationChannel, NotificationDetails } from '../models';

export type Platform = 'android' | 'ios';

export interface RendererInitializationSettings {
  android: { defaultIcon: string };
  apple: Record<string, never>;
}

export interface NotificationResponse {
  id?: number;
  payload?: string;
}

export type NotificationResponseCallback = (
  response: NotificationResponse,
) => void;

export interface NotificationAppLaunchDetails {
  didNotificationLaunchApp: boolean;
  notificationResponse?: NotificationResponse;
}

export interface ChannelManager {
  /**
   * Creates the channel, or updates it when a channel with the same id exists.
   */
  createNotificationChannel(channel: NotificationChannel): Promise<void>;
  getNotificationChannels(): Promise<NotificationChannel[]>;
  deleteNotificationChannel(channelId: string): Promise<void>;
}

export type ChannelCapability =
  | { kind: 'supported'; channels: ChannelManager }
  | { kind: 'unsupported' };

export interface LocalNotificationRenderer {
  readonly platform: Platform;

  initialize(
    settings: RendererInitializationSettings,
    onResponse?: NotificationResponseCallback,
  ): Promise<void>;

  show(
    id: number,
    title: string,
    body: string | undefined,
    details: NotificationDetails,
    payload: string,
  ): Promise<void>;

  getNotificationAppLaunchDetails(): Promise<NotificationAppLaunchDetails | null>;

  /**
   * Channel management is only available where the platform has channels.
   */
  channelCapability(): ChannelCapability;
}
