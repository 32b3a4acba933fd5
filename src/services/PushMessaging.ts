/**
 * PushMessaging - orchestrates the push transport and the local notification
 * renderer
 */

import {
  AndroidNotificationSettings,
  ChannelSettings,
  NotificationChannel,
  RemoteMessage,
  createAndroidNotificationSettings,
} from '../models';
import {
  BackgroundMessageHandler,
  LocalNotificationRenderer,
  NotificationResponse,
  PermissionRequestOptions,
  Platform,
  PushTransport,
  RemoteMessageListener,
  Unsubscribe,
} from '../platform';
import { describeError, NotInitializedError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import {
  decodePayload,
  encodePayload,
  NotificationPayload,
} from '../utils/payload';
import { ValidationUtils } from '../utils/validation';
import { ChannelReconciler, ReconciliationResult } from './ChannelReconciler';
import { MessageMapper } from './MessageMapper';

/**
 * Called with the message data when the user taps a notification.
 */
export type OnNotificationOpened = (data: NotificationPayload | null) => void;

export interface SetupNotificationsOptions {
  androidSettings?: AndroidNotificationSettings;
  onNotificationSelected?: OnNotificationOpened;
  /** Present notifications while the app is in the foreground */
  enableForegroundNotifications?: boolean;
  shouldUpdateAndroidNotificationChannels?: boolean;
}

export interface GetTokenOptions {
  recreateToken?: boolean;
}

/**
 * The surface the handler depends on.
 */
export interface Notifications {
  readonly platform: Platform;

  setupNotifications(options?: SetupNotificationsOptions): Promise<void>;
  updateAndroidNotificationChannels(
    notificationChannelSettings: ChannelSettings,
  ): Promise<ReconciliationResult>;
  showRemoteMessageNotification(message: RemoteMessage): Promise<boolean>;

  onMessage(listener: RemoteMessageListener): Unsubscribe;
  onMessageOpenedApp(listener: RemoteMessageListener): Unsubscribe;
  setBackgroundMessageHandler(handler: BackgroundMessageHandler): void;
}

export class PushMessaging implements Notifications {
  private logger: Logger;
  private reconciler: ChannelReconciler;
  private mapper: MessageMapper;
  private androidSettings?: AndroidNotificationSettings;

  constructor(
    private transport: PushTransport,
    private renderer: LocalNotificationRenderer,
  ) {
    this.logger = createLogger('PushMessaging');
    this.reconciler = new ChannelReconciler(renderer);
    this.mapper = new MessageMapper();
  }

  get platform(): Platform {
    return this.renderer.platform;
  }

  /**
   * Sets up push notifications. Must be called before any other method,
   * normally when the application launches.
   */
  async setupNotifications({
    androidSettings = createAndroidNotificationSettings(),
    onNotificationSelected,
    enableForegroundNotifications = false,
    shouldUpdateAndroidNotificationChannels = true,
  }: SetupNotificationsOptions = {}): Promise<void> {
    const settings = ValidationUtils.validateAndroidSettings(androidSettings);

    this.logger.info('Setting up notifications', {
      platform: this.platform,
      enableForegroundNotifications,
      updateChannels: shouldUpdateAndroidNotificationChannels,
    });

    this.androidSettings = settings;

    await this.transport.setForegroundNotificationPresentationOptions({
      alert: enableForegroundNotifications,
      badge: enableForegroundNotifications,
      sound: enableForegroundNotifications,
    });

    await this.renderer.initialize(
      {
        android: { defaultIcon: settings.defaultNotificationIcon },
        apple: {},
      },
      onNotificationSelected
        ? (response) =>
            onNotificationSelected(this.readResponsePayload(response))
        : undefined,
    );

    if (shouldUpdateAndroidNotificationChannels) {
      await this.updateAndroidNotificationChannels(
        settings.notificationChannelSettings,
      );
    }
  }

  /**
   * Updates the Android notification channels. Channels that are not part of
   * the settings get removed.
   */
  async updateAndroidNotificationChannels(
    notificationChannelSettings: ChannelSettings,
  ): Promise<ReconciliationResult> {
    const desired = ValidationUtils.validateChannelSettings(
      notificationChannelSettings,
    );

    if (this.androidSettings) {
      this.androidSettings = {
        ...this.androidSettings,
        notificationChannelSettings: desired,
      };
    }

    return this.reconciler.reconcile(desired);
  }

  /**
   * Shows `message` as a local notification. Messages without a title are not
   * shown.
   *
   * @returns whether a notification was handed to the renderer
   */
  async showRemoteMessageNotification(message: RemoteMessage): Promise<boolean> {
    if (!this.androidSettings) {
      throw new NotInitializedError('showRemoteMessageNotification');
    }

    const knownChannels =
      message.notification?.android?.channelId === undefined
        ? []
        : await this.getKnownChannels();
    const params = this.mapper.mapToLocalNotification(
      message,
      this.androidSettings.notificationChannelSettings,
      knownChannels,
    );

    if (!params) {
      return false;
    }

    await this.renderer.show(
      params.id,
      params.title,
      params.body,
      { android: params.android, apple: params.apple },
      encodePayload(params.data),
    );

    this.logger.debug('Remote message shown as local notification', {
      messageId: message.messageId,
      notificationId: params.id,
    });

    return true;
  }

  /**
   * Requests permission to display notifications.
   *
   * @returns `true` if the user authorized notifications
   */
  async requestPermissions(
    options: Partial<PermissionRequestOptions> = {},
  ): Promise<boolean> {
    const status = await this.transport.requestPermission({
      alert: true,
      announcement: false,
      badge: true,
      carPlay: false,
      criticalAlert: false,
      provisional: false,
      sound: true,
      ...options,
    });

    this.logger.info('Notification permission requested', { status });
    return status === 'authorized';
  }

  /**
   * The push token of the current device.
   */
  async getToken({ recreateToken = false }: GetTokenOptions = {}): Promise<
    string | null
  > {
    if (recreateToken) {
      await this.removeToken();
    }
    return this.transport.getToken();
  }

  async removeToken(): Promise<void> {
    await this.transport.deleteToken();
  }

  /**
   * Data of the notification that launched the application, if it was
   * terminated before the user tapped it.
   */
  async getAppLaunchNotificationData(): Promise<NotificationPayload | null> {
    const initialMessage = await this.transport.getInitialMessage();
    if (initialMessage) {
      return initialMessage.data;
    }

    const launchDetails = await this.renderer.getNotificationAppLaunchDetails();
    if (
      launchDetails?.didNotificationLaunchApp &&
      launchDetails.notificationResponse?.payload !== undefined
    ) {
      return this.readResponsePayload(launchDetails.notificationResponse);
    }

    return null;
  }

  onMessage(listener: RemoteMessageListener): Unsubscribe {
    return this.transport.onMessage(listener);
  }

  onMessageOpenedApp(listener: RemoteMessageListener): Unsubscribe {
    return this.transport.onMessageOpenedApp(listener);
  }

  setBackgroundMessageHandler(handler: BackgroundMessageHandler): void {
    this.transport.setBackgroundMessageHandler(handler);
  }

  private async getKnownChannels(): Promise<NotificationChannel[]> {
    const capability = this.renderer.channelCapability();
    if (capability.kind === 'unsupported') {
      return [];
    }

    try {
      return await capability.channels.getNotificationChannels();
    } catch (error) {
      this.logger.warn('Failed to read notification channels', {
        error: describeError(error),
      });
      return [];
    }
  }

  private readResponsePayload(
    response: NotificationResponse,
  ): NotificationPayload | null {
    if (response.payload === undefined) {
      return null;
    }

    const result = decodePayload(response.payload);
    if (!result.success) {
      this.logger.warn('Ignoring undecodable notification payload', {
        notificationId: response.id,
        error: describeError(result.error),
      });
      return null;
    }
    return result.data;
  }
}
