/**
 * 核心错误测试
 */

import { CoreError } from '@domain/errors/CoreError.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';
import {
  ErrorRecoveryStrategy,
  ErrorSeverity,
  ErrorType,
} from '@domain/errors/CoreErrorTypes.js';

describe('CoreError', () => {
  test('未提供消息时使用类型的默认消息', () => {
    const error = new CoreError(ErrorType.NO_PACKAGE_SELECTED);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CoreError');
    expect(error.message).toBe('You must select a pipeline package first');
    expect(error.code).toBe('NO_PACKAGE_SELECTED');
    expect(error.severity).toBe(ErrorSeverity.LOW);
    expect(error.recoveryStrategy).toBe(ErrorRecoveryStrategy.MANUAL);
    expect(error.shouldLogStack).toBe(false);
  });

  test('选项覆盖类型的默认配置', () => {
    const error = new CoreError(ErrorType.VALIDATION_ERROR, 'bad input', {
      code: 'E_INPUT',
      severity: ErrorSeverity.HIGH,
      recoveryStrategy: ErrorRecoveryStrategy.RETRY,
      errorId: 'err_fixed',
    });

    expect(error.message).toBe('bad input');
    expect(error.code).toBe('E_INPUT');
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.recoveryStrategy).toBe(ErrorRecoveryStrategy.RETRY);
    expect(error.errorId).toBe('err_fixed');
  });

  test('is 按类型判断', () => {
    const error = new CoreError(ErrorType.UNKNOWN_STEP_INDEX);

    expect(CoreError.is(error)).toBe(true);
    expect(CoreError.is(error, ErrorType.UNKNOWN_STEP_INDEX)).toBe(true);
    expect(CoreError.is(error, ErrorType.MALFORMED_STEP_CODE)).toBe(false);
    expect(CoreError.is(new Error('plain'))).toBe(false);
  });

  test('toJSON 省略空的详情和上下文', () => {
    const error = new CoreError(ErrorType.INTERNAL_ERROR, 'boom', {
      errorId: 'err_1',
      details: {},
      cause: new TypeError('inner'),
    });

    const json = error.toJSON();

    expect(json).toMatchObject({
      errorId: 'err_1',
      type: 'INTERNAL_ERROR',
      message: 'boom',
      severity: 'HIGH',
      recoveryStrategy: 'NONE',
      cause: { name: 'TypeError', message: 'inner' },
    });
    expect(json).not.toHaveProperty('details');
    expect(json).not.toHaveProperty('context');
  });
});

describe('CoreErrorFactory', () => {
  test('invalidPackageIdentifier 列出可用序号', () => {
    const error = CoreErrorFactory.invalidPackageIdentifier(7, [0, 1]);

    expect(error.type).toBe(ErrorType.INVALID_PACKAGE_IDENTIFIER);
    expect(error.message).toBe(
      "Package identifier '7' is not an installed package index",
    );
    expect(error.details).toEqual({ packageId: '7', available: [0, 1] });
    expect(error.context).toEqual({ operation: 'setPackage' });
  });

  test('unknownParameterName 带上包标题', () => {
    const error = CoreErrorFactory.unknownParameterName('gamma', ['sigma'], {
      packageTitle: 'T1proc',
    });

    expect(error.type).toBe(ErrorType.UNKNOWN_PARAMETER_NAME);
    expect(error.message).toBe(
      "Parameter 'gamma' is not declared by this package",
    );
    expect(error.details).toEqual({ name: 'gamma', known: ['sigma'] });
    expect(error.context).toEqual({ packageTitle: 'T1proc' });
  });

  test('invalidParameterValue 合并所有问题', () => {
    const error = CoreErrorFactory.invalidParameterValue('sigma', [
      'too small',
      'not finite',
    ]);

    expect(error.message).toBe(
      "Invalid value for parameter 'sigma': too small; not finite",
    );
  });

  test('unknownStepIndex 描述注册范围', () => {
    expect(CoreErrorFactory.unknownStepIndex(5, 2).message).toBe(
      'Step index 5 is outside the registered range [0, 2)',
    );
    expect(CoreErrorFactory.unknownStepIndex(0, 0).message).toBe(
      'Step index 0 is outside the registered range empty',
    );
  });

  test('malformedStepCode 记录收到的值', () => {
    const error = CoreErrorFactory.malformedStepCode(['ab', 12]);

    expect(error.type).toBe(ErrorType.MALFORMED_STEP_CODE);
    expect(error.message).toBe(
      'Step code must be a 3-character string or a list of them',
    );
    expect(error.details).toEqual({ stepCode: '[ab, <number>]' });
  });

  test('fromError 包装普通错误，CoreError 原样返回', () => {
    const original = new Error('disk full');
    const wrapped = CoreErrorFactory.fromError(original, { operation: 'run' });

    expect(wrapped.type).toBe(ErrorType.INTERNAL_ERROR);
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause).toBe(original);
    expect(wrapped.context).toEqual({ operation: 'run' });

    const core = CoreErrorFactory.validation('bad');
    expect(CoreErrorFactory.fromError(core)).toBe(core);
    expect(CoreErrorFactory.fromError('text').message).toBe('text');
  });
});
