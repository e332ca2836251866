import { configSchema } from './schema.js';
import type { Config } from '../types/config.types.js';

/**
 * Empty strings in .env files mean "not set"
 */
function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    botToken: env.BOT_TOKEN,
    dbPath: optional(env.DB_PATH),
    adminIds: optional(env.ADMIN_IDS),
    forumChatId: optional(env.FORUM_CHAT_ID),
    topicId: optional(env.TOPIC_ID),
    nodeEnv: env.NODE_ENV ?? 'development',
    timezone: optional(env.TZ),
    logLevel: optional(env.LOG_LEVEL),
    webhookUrl: optional(env.WEBHOOK_URL),
    port: optional(env.PORT),
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}
