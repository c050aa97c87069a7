import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
    name: 'jsonpull',
    level: process.env.JSONPULL_LOG_LEVEL ?? 'silent',
});
