/**
 * Validation schemas and utilities for notification settings and payloads
 */

import { z } from 'zod';
import {
  AndroidNotificationSettings,
  ChannelSettings,
  NotificationChannel,
} from '../models';
import { handleValidationError } from './errors';

export const importanceSchema = z.enum([
  'unspecified',
  'none',
  'min',
  'low',
  'default',
  'high',
  'max',
]);

export const notificationChannelSchema = z.object({
  id: z.string().min(1, { message: 'Channel id must not be empty' }),
  name: z.string().min(1, { message: 'Channel name must not be empty' }),
  importance: importanceSchema,
  description: z.string().optional(),
  playSound: z.boolean().optional(),
  enableVibration: z.boolean().optional(),
  showBadge: z.boolean().optional(),
});

// Channel ids must be unique across the default and the additional channels
export const channelSettingsSchema = z
  .object({
    defaultChannel: notificationChannelSchema,
    channels: z.array(notificationChannelSchema),
  })
  .superRefine((settings, ctx) => {
    const seen = new Set<string>([settings.defaultChannel.id]);
    settings.channels.forEach((channel, index) => {
      if (seen.has(channel.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['channels', index, 'id'],
          message: `Duplicate channel id "${channel.id}"`,
        });
      }
      seen.add(channel.id);
    });
  });

export const androidNotificationSettingsSchema = z.object({
  defaultNotificationIcon: z
    .string()
    .min(1, { message: 'Default notification icon must not be empty' }),
  notificationChannelSettings: channelSettingsSchema,
});

// Opaque notification payload: a flat string map
export const payloadSchema = z.record(z.string());
export const payloadEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

export class ValidationUtils {
  /**
   * Validates a single notification channel
   */
  static validateChannel(channel: unknown): NotificationChannel {
    const result = notificationChannelSchema.safeParse(channel);
    if (!result.success) {
      throw handleValidationError(result.error, 'notification channel');
    }
    return result.data;
  }

  /**
   * Validates channel settings, rejecting duplicate channel ids
   */
  static validateChannelSettings(settings: unknown): ChannelSettings {
    const result = channelSettingsSchema.safeParse(settings);
    if (!result.success) {
      throw handleValidationError(result.error, 'channel settings');
    }
    return result.data;
  }

  static validateAndroidSettings(
    settings: unknown,
  ): AndroidNotificationSettings {
    const result = androidNotificationSettingsSchema.safeParse(settings);
    if (!result.success) {
      throw handleValidationError(result.error, 'Android notification settings');
    }
    return result.data;
  }
}

export type NotificationChannelInput = z.infer<typeof notificationChannelSchema>;
export type ChannelSettingsInput = z.infer<typeof channelSettingsSchema>;
