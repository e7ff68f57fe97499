import winston from 'winston';
import type { AppConfig } from './index';

export const logger = winston.createLogger({
    level: 'info',
    silent: process.env.NODE_ENV === 'test',

    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss'
        }),

        winston.format.errors({ stack: true }),

        winston.format.colorize({ all: process.env.NODE_ENV !== 'production' }),

        winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
            let log = `${timestamp} [${level}]: ${message}`;

            if (Object.keys(meta).length > 0) {
                log += ` ${JSON.stringify(meta)}`;
            }

            if (stack) {
                log += `\n${stack}`;
            }

            return log;
        })
    ),

    transports: [
        new winston.transports.Console()
    ]
});

/** Applies the loaded config: level, and file transports in production. */
export const configureLogger = (config: Pick<AppConfig, 'env' | 'logLevel'>): winston.Logger => {
    logger.level = config.logLevel;

    if (config.env === 'production') {
        logger.add(new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error'
        }));

        logger.add(new winston.transports.File({
            filename: 'logs/combined.log'
        }));
    }

    return logger;
};
