import pino, { type Logger } from 'pino';

/**
 * Default logger for the blocks, level taken from LOG_LEVEL.
 */
export const logger: Logger = pino({
    name: 'navtri',
    level: process.env.LOG_LEVEL || 'info',
});
