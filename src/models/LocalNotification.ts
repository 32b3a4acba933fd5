/**
 * LocalNotification model - parameters handed to the local notification renderer
 */

import { Importance } from './NotificationChannel';

export type Priority = 'min' | 'low' | 'default' | 'high' | 'max';

export type NotificationVisibility = 'private' | 'public' | 'secret';

export interface AndroidNotificationDetails {
  channelId: string;
  channelName: string;
  playSound: boolean;
  sound?: string; // raw resource name
  importance: Importance;
  priority: Priority;
  visibility?: NotificationVisibility;
  icon?: string;
  tag?: string;
  ticker?: string;
}

export interface DarwinNotificationDetails {
  presentSound: boolean;
  sound?: string;
  presentBadge: boolean;
  badgeNumber?: number;
}

export interface NotificationDetails {
  android?: AndroidNotificationDetails;
  apple?: DarwinNotificationDetails;
}

export interface ResolvedNotificationParameters extends NotificationDetails {
  id: number;
  title: string;
  body?: string;
  data: Record<string, string>;
}
