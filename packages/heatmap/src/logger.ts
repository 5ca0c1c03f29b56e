import pino from 'pino';
import { config } from './config.js';

export const logger = pino({
    level: config.LOG_LEVEL,
    enabled: config.NODE_ENV !== 'test',
    transport:
        config.NODE_ENV === 'development'
            ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
            : undefined,
});
