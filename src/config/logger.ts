import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';

const consoleFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
    }),

    winston.format.errors({ stack: true }),

    winston.format.colorize({ all: true }),

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
);

// One JSON object per line in production, for log shippers.
const jsonFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

export const createLogFormat = (nodeEnv: string | undefined): winston.Logform.Format =>
    nodeEnv === 'production' ? jsonFormat : consoleFormat;

export const logger = winston.createLogger({
    level: logLevel,
    silent: process.env.NODE_ENV === 'test',
    defaultMeta: { service: process.env.SERVICE_NAME || 'fraud-trace-service' },
    format: createLogFormat(process.env.NODE_ENV),
    transports: [
        new winston.transports.Console({
            level: logLevel
        })
    ]
});

if (process.env.NODE_ENV === 'production') {
    logger.add(new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
    }));

    logger.add(new winston.transports.File({
        filename: 'logs/combined.log'
    }));
}
