import { z } from 'zod';

const idList = z
  .string()
  .regex(/^\s*-?\d+(\s*,\s*-?\d+)*\s*$/, 'ADMIN_IDS must be a comma-separated list of numeric IDs');

export const configSchema = z.object({
  botToken: z.string().min(1, 'BOT_TOKEN is required'),
  dbPath: z.string().min(1).default('admin.db'),
  adminIds: idList.optional(),
  forumChatId: z
    .string()
    .regex(/^-\d+$/, 'FORUM_CHAT_ID must start with - and be numeric')
    .optional(),
  topicId: z.string().regex(/^\d+$/, 'TOPIC_ID must be a non-negative integer').optional(),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  timezone: z.string().default('Europe/Moscow'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  webhookUrl: z.string().url('WEBHOOK_URL must be a valid URL').optional(),
  port: z.coerce.number().int().positive().default(3000),
});

export type ConfigSchema = z.infer<typeof configSchema>;
