/**
 * 日志模块，基于 Winston 实现结构化、分级别的日志输出
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import { AppConfig } from '@config/config.js';

/**
 * 日志器接口，编排器和插件步骤只依赖这四个级别
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * 创建一个 Winston Logger 实例
 * @param config - 应用程序配置中的日志部分
 * @returns {Logger} 配置好的日志器实例
 */
export function createLogger(config: Pick<AppConfig, 'log'>): Logger {
  const { combine, timestamp, json, colorize, simple } = winston.format;

  // 只有配置了日志目录才写文件
  const fileTransports = config.log.dirname
    ? [
        new DailyRotateFile({
          dirname: path.resolve(config.log.dirname),
          filename: 'pipeline-%DATE%.log',
          datePattern: config.log.datePattern || 'YYYY-MM-DD',
          zippedArchive: config.log.zippedArchive ?? true,
          maxSize: config.log.maxSize || '20m',
          // 支持天数(如 '14d')或数量(如 '30')。
          maxFiles: config.log.maxFiles || '14d',
          level: config.log.level,
        }),
      ]
    : [];

  return winston.createLogger({
    level: config.log.level, // 从配置中获取日志级别
    format: combine(timestamp(), json()), // 结合时间戳和 JSON 格式进行结构化日志输出
    transports: [
      // 配置控制台传输器
      new winston.transports.Console({
        format: combine(colorize(), simple()), // 控制台输出带颜色和简洁格式
      }),
      ...fileTransports,
    ],
  });
}

/**
 * 默认的日志器实例，方便在未明确配置时使用
 */
export const logger: Logger = createLogger({
  log: { level: process.env.LOG_LEVEL || 'info' },
});

/**
 * 创建给每条消息加上 `[scope]` 前缀的日志器，交给插件步骤使用
 * @param logger - 底层日志器
 * @param scope - 前缀内容（通常为包标题）
 * @returns 带前缀的日志器
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    debug: (message, ...args) => logger.debug(prefix + message, ...args),
    info: (message, ...args) => logger.info(prefix + message, ...args),
    warn: (message, ...args) => logger.warn(prefix + message, ...args),
    error: (message, ...args) => logger.error(prefix + message, ...args),
  };
}
