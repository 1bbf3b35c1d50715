/**
 * 核心错误类定义
 * 编排器抛出的所有错误都是 CoreError，通过 type 区分错误种类
 */

import {
  ErrorType,
  ErrorSeverity,
  ErrorRecoveryStrategy,
  ErrorContext,
  ErrorOptions,
  getErrorTypeConfig,
} from './CoreErrorTypes.js';

/**
 * 核心错误类
 */
export class CoreError extends Error {
  /** 错误类型 */
  public readonly type: ErrorType;

  /** 错误代码 */
  public readonly code: string;

  /** 错误ID */
  public readonly errorId: string;

  /** 错误严重级别 */
  public readonly severity: ErrorSeverity;

  /** 恢复策略 */
  public readonly recoveryStrategy: ErrorRecoveryStrategy;

  /** 错误详情 */
  public readonly details?: Record<string, unknown>;

  /** 错误上下文 */
  public readonly context?: ErrorContext;

  /** 原始错误 */
  public readonly cause?: Error;

  /** 时间戳 */
  public readonly timestamp: number;

  /** 是否应该记录堆栈 */
  public readonly shouldLogStack: boolean;

  /**
   * 创建核心错误实例
   * @param type 错误类型
   * @param message 错误消息，缺省时使用类型的默认消息
   * @param options 错误选项
   */
  constructor(type: ErrorType, message?: string, options: ErrorOptions = {}) {
    const config = getErrorTypeConfig(type);
    super(message ?? config.defaultMessage);

    this.name = 'CoreError';
    this.type = type;
    this.code = options.code || type;
    this.errorId = options.errorId || this.generateErrorId();
    this.timestamp = Date.now();
    this.cause = options.cause;
    this.details = options.details;
    this.context = options.context;

    // 设置错误属性，优先使用传入的选项
    this.severity = options.severity ?? config.defaultSeverity;
    this.recoveryStrategy =
      options.recoveryStrategy ?? config.defaultRecoveryStrategy;
    this.shouldLogStack = options.shouldLogStack ?? config.shouldLogStack;

    // 保持堆栈跟踪
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CoreError);
    }
  }

  /**
   * 生成错误ID
   * @returns 错误ID字符串
   */
  private generateErrorId(): string {
    return `err_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  /**
   * 判断给定错误是否为指定类型的 CoreError
   * @param error 任意错误
   * @param type 期望的错误类型
   * @returns 是否匹配
   */
  static is(error: unknown, type?: ErrorType): error is CoreError {
    return (
      error instanceof CoreError && (type === undefined || error.type === type)
    );
  }

  /**
   * 转换为JSON格式
   * @returns JSON格式的错误信息
   */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      errorId: this.errorId,
      type: this.type,
      message: this.message,
      severity: this.severity,
      recoveryStrategy: this.recoveryStrategy,
      timestamp: this.timestamp,
    };

    if (this.details && Object.keys(this.details).length > 0) {
      result.details = this.details;
    }

    if (this.context && Object.keys(this.context).length > 0) {
      result.context = this.context;
    }

    if (this.cause) {
      result.cause = {
        name: this.cause.name,
        message: this.cause.message,
      };
    }

    if (this.shouldLogStack && process.env.NODE_ENV === 'development') {
      result.stack = this.stack;
    }

    return result;
  }
}
