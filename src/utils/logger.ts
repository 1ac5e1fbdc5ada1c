import winston from 'winston';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const isProduction = process.env.NODE_ENV === 'production';

const consoleFormat = printf(({ level, message, timestamp: time, stack }) => {
  return `${time} [${level}]: ${stack ?? message}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp(),
    splat(),
    isProduction ? json() : combine(colorize(), consoleFormat)
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
