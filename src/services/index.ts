/**
 * Services exports
 */

export * from './ChannelReconciler';
export * from './MessageMapper';
export * from './PushMessaging';
