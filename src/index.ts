/**
 * push-messaging - remote push messages shown through local notifications
 */

export * from './models';
export * from './platform';
export * from './services';
export * from './handler';
export { loadConfig, defaultAndroidNotificationSettings } from './config';
export type { PushMessagingConfig } from './config';
export {
  PushMessagingError,
  ValidationError,
  MalformedBadgeError,
  PayloadDecodeError,
  NotInitializedError,
  HandlerAlreadyMountedError,
} from './utils/errors';
export { encodePayload, decodePayload } from './utils/payload';
export type { NotificationPayload, PayloadResult } from './utils/payload';
export { ValidationUtils } from './utils/validation';
export { createLogger } from './utils/logger';
