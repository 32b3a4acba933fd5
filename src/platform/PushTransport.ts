/**
 * PushTransport - contract of the remote push delivery service
 */

import { RemoteMessage } from '../models';

export type AuthorizationStatus =
  | 'authorized'
  | 'denied'
  | 'notDetermined'
  | 'provisional';

export interface PermissionRequestOptions {
  alert: boolean;
  announcement: boolean;
  badge: boolean;
  carPlay: boolean;
  criticalAlert: boolean;
  provisional: boolean;
  sound: boolean;
}

export interface ForegroundPresentationOptions {
  alert: boolean;
  badge: boolean;
  sound: boolean;
}

export type RemoteMessageListener = (message: RemoteMessage) => void;

export type BackgroundMessageHandler = (
  message: RemoteMessage,
) => Promise<void>;

export type Unsubscribe = () => void;

export interface PushTransport {
  requestPermission(
    options: PermissionRequestOptions,
  ): Promise<AuthorizationStatus>;

  /**
   * Returns the device token, issuing a new one if the previous token was
   * deleted.
   */
  getToken(): Promise<string | null>;
  deleteToken(): Promise<void>;

  setForegroundNotificationPresentationOptions(
    options: ForegroundPresentationOptions,
  ): Promise<void>;

  onMessage(listener: RemoteMessageListener): Unsubscribe;
  onMessageOpenedApp(listener: RemoteMessageListener): Unsubscribe;

  /**
   * Replaces the process-wide background handler.
   */
  setBackgroundMessageHandler(handler: BackgroundMessageHandler): void;

  /**
   * The message whose notification launched the app from a terminated state.
   */
  getInitialMessage(): Promise<RemoteMessage | null>;
}
