/**
 * Encoding of the opaque payload attached to a displayed notification
 */

import { ZodError } from 'zod';
import { OperationResult } from '../models';
import { PayloadDecodeError } from './errors';
import { payloadEntriesSchema, payloadSchema } from './validation';

export type NotificationPayload = Record<string, string>;

export type PayloadResult = OperationResult<
  NotificationPayload,
  PayloadDecodeError
>;

const formatIssues = (error: ZodError): string =>
  error.errors
    .map((err) =>
      err.path.length ? `${err.path.join('.')}: ${err.message}` : err.message,
    )
    .join(', ');

export const encodePayload = (data: NotificationPayload): string =>
  JSON.stringify(data);

export const decodePayload = (text: string): PayloadResult => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      success: false,
      error: new PayloadDecodeError(
        error instanceof Error ? error.message : 'invalid JSON',
        error,
      ),
    };
  }

  // Payloads written for messages without data are stored as "null"
  if (parsed === null) {
    return { success: true, data: {} };
  }

  const result = payloadSchema.safeParse(parsed);
  if (!result.success) {
    return {
      success: false,
      error: new PayloadDecodeError(formatIssues(result.error)),
    };
  }

  // z.record skips a "__proto__" key; rebuild the map from the own entries
  const entries = payloadEntriesSchema.safeParse(
    typeof parsed === 'object' ? Object.entries(parsed) : [],
  );
  if (!entries.success) {
    return {
      success: false,
      error: new PayloadDecodeError(formatIssues(entries.error)),
    };
  }

  return { success: true, data: Object.fromEntries(entries.data) };
};
