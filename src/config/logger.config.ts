import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';
import { ConfigService } from '@nestjs/config';

const MAX_LOG_FILE_SIZE = 5 * 1024 * 1024;

const consoleLine = winston.format.printf(
  ({ timestamp, level, message, context, stack, ...meta }) => {
    const scope = typeof context === 'string' ? ` [${context}]` : '';
    const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${timestamp} ${level}${scope} ${message}${details}${trace}`;
  },
);

const jsonFile = (filename: string, level?: string) =>
  new winston.transports.File({
    filename,
    level,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    maxsize: MAX_LOG_FILE_SIZE,
    maxFiles: 5,
  });

export const getLoggerConfig = (configService: ConfigService): WinstonModuleOptions => {
  const isProduction = configService.get<string>('NODE_ENV') === 'production';
  const level = configService.get<string>('LOG_LEVEL') || (isProduction ? 'info' : 'debug');

  return {
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
    ),
    defaultMeta: { service: 'org-directory-api' },
    transports: [
      new winston.transports.Console({
        // В production консоль читает сборщик логов, цвета ему мешают
        format: isProduction
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), consoleLine),
      }),
      jsonFile('logs/error.log', 'error'),
      jsonFile('logs/combined.log'),
    ],
  };
};
