/**
 * PushMessagingHandler - wires push messaging into the host UI lifecycle.
 *
 * The host calls `mount()` once the component is attached, `update()` with the
 * new props whenever its configuration changes, and `unmount()` on teardown.
 * Only one handler may be mounted per notifications service.
 */

import {
  AndroidNotificationSettings,
  RemoteMessage,
  createAndroidNotificationSettings,
  isNotificationMessage,
} from '../models';
import { Notifications, OnNotificationOpened } from '../services/PushMessaging';
import { HandlerAlreadyMountedError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { SubscriptionRegistry } from './SubscriptionRegistry';

/**
 * Called when a message is received in the foreground or background.
 */
export type OnMessage = (message: RemoteMessage) => Promise<void>;

export interface PushMessagingHandlerProps {
  notifications: Notifications;
  /** Messages received while the app is in the foreground */
  onForegroundMessage?: OnMessage;
  /**
   * Messages received while the app is in the background but not terminated.
   * Runs outside the UI context, so it must not rely on handler state.
   */
  onBackgroundMessage?: OnMessage;
  onNotificationOpened?: OnNotificationOpened;
  androidNotificationSettings?: AndroidNotificationSettings;
  /** Whether notifications are displayed while the app is in the foreground */
  enableForegroundNotifications?: boolean;
}

type ResolvedProps = Omit<
  PushMessagingHandlerProps,
  'androidNotificationSettings' | 'enableForegroundNotifications'
> & {
  androidNotificationSettings: AndroidNotificationSettings;
  enableForegroundNotifications: boolean;
};

const DEFAULT_ANDROID_SETTINGS = createAndroidNotificationSettings();

const mountedServices = new WeakSet<Notifications>();

// Registered in place of a removed background handler
const resetBackgroundHandler: OnMessage = async () => {};

const resolveProps = (props: PushMessagingHandlerProps): ResolvedProps => ({
  ...props,
  androidNotificationSettings:
    props.androidNotificationSettings ?? DEFAULT_ANDROID_SETTINGS,
  enableForegroundNotifications: props.enableForegroundNotifications ?? false,
});

export class PushMessagingHandler {
  private logger: Logger;
  private props: ResolvedProps;
  private readonly notifications: Notifications;
  private subscriptions = new SubscriptionRegistry();
  private mounted = false;

  constructor(props: PushMessagingHandlerProps) {
    this.logger = createLogger('PushMessagingHandler');
    this.props = resolveProps(props);
    this.notifications = props.notifications;
  }

  get isMounted(): boolean {
    return this.mounted;
  }

  async mount(): Promise<void> {
    if (this.mounted) {
      return;
    }
    if (mountedServices.has(this.notifications)) {
      throw new HandlerAlreadyMountedError();
    }

    mountedServices.add(this.notifications);
    this.mounted = true;

    try {
      await this.initNotifications(false);
    } catch (error) {
      this.logger.error('Failed to set up push messaging', { error });
      this.unmount();
      throw error;
    }
  }

  async update(nextProps: PushMessagingHandlerProps): Promise<void> {
    const previous = this.props;
    this.props = resolveProps(nextProps);

    if (nextProps.notifications !== this.notifications) {
      this.logger.warn(
        'The notifications service cannot be replaced after construction',
      );
    }

    if (!this.mounted) {
      return;
    }

    if (previous.onBackgroundMessage !== this.props.onBackgroundMessage) {
      this.notifications.setBackgroundMessageHandler(
        this.props.onBackgroundMessage ?? resetBackgroundHandler,
      );
    }

    if (previous.onForegroundMessage !== this.props.onForegroundMessage) {
      this.startListeningToRemoteMessages();
    }

    if (previous.onNotificationOpened !== this.props.onNotificationOpened) {
      await this.initNotifications(true);
    }

    if (
      previous.androidNotificationSettings !==
        this.props.androidNotificationSettings ||
      previous.enableForegroundNotifications !==
        this.props.enableForegroundNotifications
    ) {
      await this.notifications.updateAndroidNotificationChannels(
        this.props.androidNotificationSettings.notificationChannelSettings,
      );
    }
  }

  unmount(): void {
    if (!this.mounted) {
      return;
    }

    this.subscriptions.cancelAll();
    mountedServices.delete(this.notifications);
    this.mounted = false;
  }

  private async initNotifications(isReinitialization: boolean): Promise<void> {
    await this.notifications.setupNotifications({
      onNotificationSelected: this.props.onNotificationOpened,
      enableForegroundNotifications: this.props.enableForegroundNotifications,
      androidSettings: this.props.androidNotificationSettings,
      shouldUpdateAndroidNotificationChannels: !isReinitialization,
    });

    // Unmounted while setting up
    if (!this.mounted) {
      return;
    }

    if (this.props.onBackgroundMessage) {
      this.notifications.setBackgroundMessageHandler(
        this.props.onBackgroundMessage,
      );
    }

    this.startListeningToRemoteMessages();

    this.subscriptions.register<RemoteMessage>(
      'opened',
      (listener) => this.notifications.onMessageOpenedApp(listener),
      (message) => {
        this.props.onNotificationOpened?.(message.data);
      },
    );
  }

  private startListeningToRemoteMessages(): void {
    this.subscriptions.register<RemoteMessage>(
      'foreground',
      (listener) => this.notifications.onMessage(listener),
      (message) => this.handleForegroundMessage(message),
    );
  }

  private async handleForegroundMessage(message: RemoteMessage): Promise<void> {
    // iOS presents foreground notifications itself
    if (
      this.notifications.platform === 'android' &&
      isNotificationMessage(message) &&
      this.props.enableForegroundNotifications
    ) {
      await this.notifications.showRemoteMessageNotification(message);
    } else if (this.props.onForegroundMessage) {
      await this.props.onForegroundMessage(message);
    }
  }
}
