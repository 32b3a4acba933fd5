import dotenv from 'dotenv';
import { z } from 'zod';
import {
  AndroidNotificationSettings,
  DEFAULT_CHANNEL_ID,
  DEFAULT_CHANNEL_NAME,
  DEFAULT_NOTIFICATION_ICON,
  createAndroidNotificationSettings,
  createDefaultChannelSettings,
} from './models';
import { handleValidationError } from './utils/errors';

dotenv.config();

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  defaultChannelId: z.string().min(1).default(DEFAULT_CHANNEL_ID),
  defaultChannelName: z.string().min(1).default(DEFAULT_CHANNEL_NAME),
  defaultNotificationIcon: z.string().min(1).default(DEFAULT_NOTIFICATION_ICON),
});

export type PushMessagingConfig = z.infer<typeof configSchema>;

/**
 * Builds the library configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): PushMessagingConfig {
  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    defaultChannelId: env.PUSH_DEFAULT_CHANNEL_ID || undefined,
    defaultChannelName: env.PUSH_DEFAULT_CHANNEL_NAME || undefined,
    defaultNotificationIcon: env.PUSH_DEFAULT_NOTIFICATION_ICON || undefined,
  });

  if (!result.success) {
    throw handleValidationError(result.error, 'configuration');
  }

  return result.data;
}

/**
 * Android settings whose default channel and icon come from the configuration
 */
export function defaultAndroidNotificationSettings(
  config: PushMessagingConfig = loadConfig(),
): AndroidNotificationSettings {
  return createAndroidNotificationSettings({
    defaultNotificationIcon: config.defaultNotificationIcon,
    notificationChannelSettings: createDefaultChannelSettings({
      defaultChannel: {
        id: config.defaultChannelId,
        name: config.defaultChannelName,
        importance: 'max',
      },
    }),
  });
}
