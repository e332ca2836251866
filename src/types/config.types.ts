export interface Config {
  botToken: string;
  dbPath: string;
  adminIds?: string;
  forumChatId?: string;
  topicId?: string;
  nodeEnv: 'development' | 'production' | 'test';
  timezone: string;
  logLevel?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  webhookUrl?: string;
  port: number;
}
