export * from './PushTransport';
export * from './LocalNotificationRenderer';
