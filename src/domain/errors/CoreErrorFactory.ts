/**
 * 核心错误工厂方法
 * 包含创建各种类型错误的静态方法
 */

import { CoreError } from './CoreError.js';
import { ErrorType, ErrorContext } from './CoreErrorTypes.js';

/**
 * 核心错误工厂类
 * 提供创建各种类型错误的静态方法
 */
export class CoreErrorFactory {
  /**
   * 创建无效包标识错误
   * @param packageId - 调用方传入的包标识
   * @param available - 当前可用的包序号
   * @returns CoreError 实例
   */
  static invalidPackageIdentifier(
    packageId: unknown,
    available: readonly number[],
  ): CoreError {
    return new CoreError(
      ErrorType.INVALID_PACKAGE_IDENTIFIER,
      `Package identifier '${String(packageId)}' is not an installed package index`,
      {
        details: { packageId: String(packageId), available: [...available] },
        context: { operation: 'setPackage' },
      },
    );
  }

  /**
   * 创建未知参数名错误
   * @param name - 参数名
   * @param known - 已声明的参数名
   * @param context - 错误上下文信息
   * @returns CoreError 实例
   */
  static unknownParameterName(
    name: string,
    known: readonly string[],
    context?: ErrorContext,
  ): CoreError {
    return new CoreError(
      ErrorType.UNKNOWN_PARAMETER_NAME,
      `Parameter '${name}' is not declared by this package`,
      { details: { name, known: [...known] }, context },
    );
  }

  /**
   * 创建参数值非法错误
   * @param name - 参数名
   * @param issues - 校验问题描述
   * @param context - 错误上下文信息
   * @returns CoreError 实例
   */
  static invalidParameterValue(
    name: string,
    issues: readonly string[],
    context?: ErrorContext,
  ): CoreError {
    return new CoreError(
      ErrorType.INVALID_PARAMETER_VALUE,
      `Invalid value for parameter '${name}': ${issues.join('; ')}`,
      { details: { name, issues: [...issues] }, context },
    );
  }

  /**
   * 创建未选择包错误
   * @param operation - 尝试执行的操作
   * @returns CoreError 实例
   */
  static noPackageSelected(operation: string): CoreError {
    return new CoreError(ErrorType.NO_PACKAGE_SELECTED, undefined, {
      context: { operation },
    });
  }

  /**
   * 创建未知步骤序号错误
   * @param index - 步骤序号
   * @param count - 已注册步骤数量
   * @param context - 错误上下文信息
   * @returns CoreError 实例
   */
  static unknownStepIndex(
    index: number,
    count: number,
    context?: ErrorContext,
  ): CoreError {
    const range = count > 0 ? `[0, ${count})` : 'empty';
    return new CoreError(
      ErrorType.UNKNOWN_STEP_INDEX,
      `Step index ${index} is outside the registered range ${range}`,
      { details: { index, count }, context },
    );
  }

  /**
   * 创建步骤代码格式错误
   * @param stepCode - 调用方传入的步骤代码
   * @returns CoreError 实例
   */
  static malformedStepCode(stepCode: unknown): CoreError {
    return new CoreError(ErrorType.MALFORMED_STEP_CODE, undefined, {
      details: { stepCode: describeValue(stepCode) },
      context: { operation: 'remove' },
    });
  }

  /**
   * 创建验证错误
   * @param message - 错误消息
   * @param details - 额外的错误详情
   * @param context - 错误上下文信息
   * @returns CoreError 实例
   */
  static validation(
    message: string,
    details?: Record<string, unknown>,
    context?: ErrorContext,
  ): CoreError {
    return new CoreError(ErrorType.VALIDATION_ERROR, message, {
      details,
      context,
    });
  }

  /**
   * 创建配置错误
   * @param message - 错误消息
   * @param details - 额外的错误详情
   * @returns CoreError 实例
   */
  static configuration(
    message: string,
    details?: Record<string, unknown>,
  ): CoreError {
    return new CoreError(ErrorType.CONFIGURATION_ERROR, message, { details });
  }

  /**
   * 从普通错误创建核心错误，CoreError 原样返回
   * @param error - 任意错误
   * @param context - 错误上下文信息
   * @returns CoreError 实例
   */
  static fromError(error: unknown, context?: ErrorContext): CoreError {
    if (error instanceof CoreError) {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new CoreError(ErrorType.INTERNAL_ERROR, cause.message, {
      cause,
      context,
    });
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => describeValue(item)).join(', ')}]`;
  }
  return `<${value === null ? 'null' : typeof value}>`;
}
