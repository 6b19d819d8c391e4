import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const formatMeta = (meta: Record<string, unknown>): string => {
    const { service: _service, ...rest } = meta;
    return Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
};

const createLogger = (level: LogLevel): winston.Logger => {
    // Operational runs get terse one-line summaries; diagnostic levels keep structured metadata
    const format = level === 'info'
        ? winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message }) => `${timestamp} ${level.toUpperCase()}: ${message}`),
        )
        : winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => `${timestamp} ${level.toUpperCase()}: ${message}${formatMeta(meta)}`),
        );

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console(),
        ],
    });
};

let logger = createLogger('info');

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
