import dotenv from 'dotenv';
dotenv.config();
/**
 * 应用程序配置对象的接口定义
 */
export type AppConfig = {
  // 编排器的全局默认值，构造编排器时未显式传入的选项使用这里的值
  preferences: {
    logging: boolean; // 是否让处理接口生成日志文件
    nThreads: number; // 传给处理接口的线程数
    verbose: boolean; // 是否输出项目摘要、包说明等信息
  };
  progress: {
    intervalMs: number; // 进度轮询间隔（毫秒）
  };
  log: {
    level: string;
    // 以下为可选的日志轮转配置（不填则不写文件）
    dirname?: string; // 日志目录
    maxFiles?: string | number; // 例如 '14d' 或 30
    maxSize?: string; // 例如 '20m'
    datePattern?: string; // 例如 'YYYY-MM-DD'
    zippedArchive?: boolean; // 是否压缩归档
  };
};

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * 校验数值参数，确保为正整数
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 校验后的数字
 */
function validateNumber(
  value: unknown,
  name: string,
  defaultValue: number,
): number {
  const num = Number(value === undefined || value === '' ? defaultValue : value);
  if (isNaN(num) || !Number.isInteger(num) || num <= 0) {
    throw new Error(`validateConfig: Invalid ${name}`);
  }
  return num;
}

/**
 * 校验布尔参数，接受 true/false/1/0/yes/no（不区分大小写）
 *
 * @param value - 要校验的值
 * @param name - 参数名称
 * @param defaultValue - 默认值
 * @returns 校验后的布尔值
 */
function validateBoolean(
  value: string | undefined,
  name: string,
  defaultValue: boolean,
): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  throw new Error(`validateConfig: Invalid ${name}`);
}

/**
 * 校验日志级别
 *
 * @param value - 要校验的值
 * @returns 校验后的日志级别
 */
function validateLogLevel(value: string | undefined): string {
  const level = (value || 'info').trim().toLowerCase();
  if (!LOG_LEVELS.includes(level)) {
    throw new Error('validateConfig: Invalid LOG_LEVEL');
  }
  return level;
}

/**
 * 读取并校验配置
 *
 * @param env - 环境变量对象
 * @returns 验证后的配置对象
 */
export function validateConfig(env = process.env): AppConfig {
  const PIPELINE_LOGGING = validateBoolean(
    env.PIPELINE_LOGGING,
    'PIPELINE_LOGGING',
    true,
  );
  const PIPELINE_THREADS = validateNumber(
    env.PIPELINE_THREADS,
    'PIPELINE_THREADS',
    1,
  );
  const PIPELINE_VERBOSE = validateBoolean(
    env.PIPELINE_VERBOSE,
    'PIPELINE_VERBOSE',
    false,
  );
  const PIPELINE_PROGRESS_INTERVAL_MS = validateNumber(
    env.PIPELINE_PROGRESS_INTERVAL_MS,
    'PIPELINE_PROGRESS_INTERVAL_MS',
    200,
  );

  const LOG_LEVEL = validateLogLevel(env.LOG_LEVEL);
  const LOG_DIR = env.LOG_DIR?.trim() || undefined;

  return {
    preferences: {
      logging: PIPELINE_LOGGING,
      nThreads: PIPELINE_THREADS,
      verbose: PIPELINE_VERBOSE,
    },
    progress: { intervalMs: PIPELINE_PROGRESS_INTERVAL_MS },
    log: {
      level: LOG_LEVEL,
      dirname: LOG_DIR,
      maxFiles: env.LOG_MAX_FILES || undefined,
      maxSize: env.LOG_MAX_SIZE || undefined,
    },
  };
}
