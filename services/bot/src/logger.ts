import pino, { type LoggerOptions } from 'pino';
import { config } from './config.js';

const base: LoggerOptions = {
  name: 'crypto-analyst-bot',
  level: config.logLevel,
  redact: ['token', '*.token', 'config.telegramToken'],
};

export const logger = pino(
  config.logPretty
    ? { ...base, transport: { target: 'pino-pretty', options: { colorize: true } } }
    : base
);

export function forConversation(identity: string, conversationId: string) {
  return logger.child({ identity, conversationId });
}
