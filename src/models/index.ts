/**
 * Models index - exports all model types and interfaces
 */

export * from './NotificationChannel';
export * from './RemoteMessage';
export * from './LocalNotification';

// Result of an operation that reports failure instead of throwing
export type OperationResult<T, E extends Error = Error> =
  | { success: true; data: T }
  | { success: false; error: E };
