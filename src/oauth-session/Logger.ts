import winston from 'winston';

const transports: winston.transport[] = [
    new winston.transports.Console({
        silent: process.env.NODE_ENV === 'test'
    }),
];

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports,
});

/**
 * Shortens a secret-ish value (state, session id) for log lines.
 */
export function redact(value: string): string {
    return value.length > 8 ? `${value.substring(0, 8)}...` : value;
}
