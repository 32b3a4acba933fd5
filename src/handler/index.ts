export * from './PushMessagingHandler';
export * from './SubscriptionRegistry';
