/**
 * 核心错误类型定义
 * 包含错误类型枚举、配置和相关工具函数
 */

/**
 * 错误严重级别
 */
export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

/**
 * 错误恢复策略
 * 编排核心不做自动重试，RETRY 仅作为提示交给调用方
 */
export enum ErrorRecoveryStrategy {
  NONE = 'NONE',
  RETRY = 'RETRY',
  MANUAL = 'MANUAL',
}

/**
 * 错误类型枚举
 */
export enum ErrorType {
  // 编排错误
  INVALID_PACKAGE_IDENTIFIER = 'INVALID_PACKAGE_IDENTIFIER',
  UNKNOWN_PARAMETER_NAME = 'UNKNOWN_PARAMETER_NAME',
  INVALID_PARAMETER_VALUE = 'INVALID_PARAMETER_VALUE',
  NO_PACKAGE_SELECTED = 'NO_PACKAGE_SELECTED',
  UNKNOWN_STEP_INDEX = 'UNKNOWN_STEP_INDEX',
  MALFORMED_STEP_CODE = 'MALFORMED_STEP_CODE',

  // 通用错误
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * 错误上下文
 */
export interface ErrorContext {
  operation?: string;
  packageTitle?: string;
  stepName?: string;
  module?: string;
  [key: string]: unknown;
}

/**
 * 错误选项
 */
export interface ErrorOptions {
  /** 错误代码（默认与类型相同） */
  code?: string;
  cause?: Error;
  context?: ErrorContext;
  details?: Record<string, unknown>;
  severity?: ErrorSeverity;
  recoveryStrategy?: ErrorRecoveryStrategy;
  shouldLogStack?: boolean;
  errorId?: string;
}

/**
 * 错误类型配置
 */
export interface ErrorTypeConfig {
  type: ErrorType;
  defaultMessage: string;
  defaultSeverity: ErrorSeverity;
  defaultRecoveryStrategy: ErrorRecoveryStrategy;
  shouldLogStack: boolean;
}

/**
 * 调用方使用错误（参数、状态不正确）的公共配置
 */
function usageError(type: ErrorType, defaultMessage: string): ErrorTypeConfig {
  return {
    type,
    defaultMessage,
    defaultSeverity: ErrorSeverity.LOW,
    defaultRecoveryStrategy: ErrorRecoveryStrategy.NONE,
    shouldLogStack: false,
  };
}

/**
 * 错误类型配置映射
 */
export const ERROR_TYPE_CONFIGS: Record<ErrorType, ErrorTypeConfig> = {
  [ErrorType.INVALID_PACKAGE_IDENTIFIER]: usageError(
    ErrorType.INVALID_PACKAGE_IDENTIFIER,
    'Package identifier must be an installed package index',
  ),
  [ErrorType.UNKNOWN_PARAMETER_NAME]: usageError(
    ErrorType.UNKNOWN_PARAMETER_NAME,
    'Unknown parameter name',
  ),
  [ErrorType.INVALID_PARAMETER_VALUE]: usageError(
    ErrorType.INVALID_PARAMETER_VALUE,
    'Invalid parameter value',
  ),
  [ErrorType.NO_PACKAGE_SELECTED]: {
    type: ErrorType.NO_PACKAGE_SELECTED,
    defaultMessage: 'You must select a pipeline package first',
    defaultSeverity: ErrorSeverity.LOW,
    defaultRecoveryStrategy: ErrorRecoveryStrategy.MANUAL,
    shouldLogStack: false,
  },
  [ErrorType.UNKNOWN_STEP_INDEX]: usageError(
    ErrorType.UNKNOWN_STEP_INDEX,
    'Unknown step index',
  ),
  [ErrorType.MALFORMED_STEP_CODE]: usageError(
    ErrorType.MALFORMED_STEP_CODE,
    'Step code must be a 3-character string or a list of them',
  ),
  [ErrorType.VALIDATION_ERROR]: usageError(
    ErrorType.VALIDATION_ERROR,
    'Validation failed',
  ),
  [ErrorType.CONFIGURATION_ERROR]: {
    type: ErrorType.CONFIGURATION_ERROR,
    defaultMessage: 'Configuration error',
    defaultSeverity: ErrorSeverity.HIGH,
    defaultRecoveryStrategy: ErrorRecoveryStrategy.MANUAL,
    shouldLogStack: true,
  },
  [ErrorType.INTERNAL_ERROR]: {
    type: ErrorType.INTERNAL_ERROR,
    defaultMessage: 'Internal error',
    defaultSeverity: ErrorSeverity.HIGH,
    defaultRecoveryStrategy: ErrorRecoveryStrategy.NONE,
    shouldLogStack: true,
  },
};

/**
 * 获取错误类型配置
 * @param type 错误类型
 * @returns 错误类型配置
 */
export function getErrorTypeConfig(type: ErrorType): ErrorTypeConfig {
  return ERROR_TYPE_CONFIGS[type];
}
