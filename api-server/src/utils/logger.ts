/**
 * 日誌工具
 * 使用 Winston 提供結構化日誌
 */
import winston from 'winston';
import { config } from '../../../shared/config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export const SERVICE_NAME = 'whale-watch-api';

/**
 * 單行格式：時間 [服務] [等級] 訊息 {其餘 metadata}，堆疊另起一行
 */
export function formatLogLine(info: winston.Logform.TransformableInfo): string {
  const { level, message, timestamp, stack, service, ...metadata } = info;
  let msg = `${String(timestamp)} [${String(service ?? SERVICE_NAME)}] [${level}] ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  if (typeof stack === 'string') {
    msg += `\n${stack}`;
  }

  return msg;
}

const customFormat = printf(formatLogLine);

export const logger = winston.createLogger({
  level: config.server.logLevel,
  silent: config.server.env === 'test',
  defaultMeta: { service: SERVICE_NAME },
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    customFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        customFormat
      )
    })
  ]
});

if (config.server.logFile) {
  logger.add(new winston.transports.File({
    filename: config.server.logFile,
    format: combine(
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      customFormat
    )
  }));
}

// 便利方法
export const log = {
  debug: (message: string, meta?: Record<string, unknown>) => logger.debug(message, meta),
  info: (message: string, meta?: Record<string, unknown>) => logger.info(message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => logger.warn(message, meta),
  error: (message: string, error?: unknown) => {
    if (error instanceof Error) {
      logger.error(message, { error: error.message, stack: error.stack });
    } else {
      logger.error(message, { error });
    }
  }
};
