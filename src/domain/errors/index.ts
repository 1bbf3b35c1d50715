/**
 * 错误处理入口文件
 */

export { CoreError } from './CoreError.js';
export { CoreErrorFactory } from './CoreErrorFactory.js';
export {
  ErrorType,
  ErrorSeverity,
  ErrorRecoveryStrategy,
  ERROR_TYPE_CONFIGS,
  getErrorTypeConfig,
} from './CoreErrorTypes.js';
export type {
  ErrorContext,
  ErrorOptions,
  ErrorTypeConfig,
} from './CoreErrorTypes.js';
