import winston from 'winston';
import path from 'path';
import type { LoggerHandle } from './types.js';
import { CONFIG } from './config.js';

export function createLogger(service: string): LoggerHandle {
  const isProd = process.env.NODE_ENV === 'production';

  const consoleFormat = isProd
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
        })
      );

  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];
  if (CONFIG.logging.dir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(CONFIG.logging.dir, `${service}.log`),
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  const logger = winston.createLogger({
    level: CONFIG.logging.level,
    defaultMeta: { service },
    transports,
  });

  return {
    debug: (msg, meta) => logger.debug(msg, meta),
    info: (msg, meta) => logger.info(msg, meta),
    warn: (msg, meta) => logger.warn(msg, meta),
    error: (msg, meta) => logger.error(msg, meta),
  };
}
