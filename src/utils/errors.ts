/**
 * Error types raised by the push messaging layer
 */

import { ZodError } from 'zod';

export class PushMessagingError extends Error {
  constructor(
    message: string,
    public code: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = 'PushMessagingError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends PushMessagingError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class MalformedBadgeError extends PushMessagingError {
  constructor(
    public badge: string,
    public messageId?: string,
  ) {
    super(`Badge "${badge}" is not a valid integer`, 'MALFORMED_BADGE');
    this.name = 'MalformedBadgeError';
  }
}

export class PayloadDecodeError extends PushMessagingError {
  constructor(message: string, cause?: unknown) {
    super(`Failed to decode notification payload: ${message}`, 'PAYLOAD_DECODE_ERROR');
    this.name = 'PayloadDecodeError';
    if (cause instanceof Error) {
      this.stack = cause.stack;
    }
  }
}

export class NotInitializedError extends PushMessagingError {
  constructor(operation: string) {
    super(
      `${operation} requires setupNotifications() to be called first`,
      'NOT_INITIALIZED',
      false,
    );
    this.name = 'NotInitializedError';
  }
}

export class HandlerAlreadyMountedError extends PushMessagingError {
  constructor() {
    super(
      'A PushMessagingHandler is already mounted for this transport. ' +
        'Mounting it twice leads to duplicated notification handling.',
      'HANDLER_ALREADY_MOUNTED',
      false,
    );
    this.name = 'HandlerAlreadyMountedError';
  }
}

// Flattens zod issues into a single validation error
export const handleValidationError = (
  error: ZodError,
  context: string,
): ValidationError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });

  return new ValidationError(
    `Invalid ${context}: ${messages.join(', ')}`,
    error.errors,
  );
};

// Log-friendly view of an unknown thrown value
export const describeError = (
  error: unknown,
): { name: string; message: string; code?: string } => {
  if (error instanceof PushMessagingError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'UnknownError', message: String(error) };
};
