import winston, { format, createLogger } from 'winston';

export const logger = createLogger({
    level: process.env.LOG_LEVEL ?? 'info',
    format: format.combine(format.splat(), format.simple()),

    transports: [new winston.transports.Console()],
});
