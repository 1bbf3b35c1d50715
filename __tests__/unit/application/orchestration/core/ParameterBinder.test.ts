/**
 * 参数绑定测试
 */

import { z } from 'zod';
import {
  ParameterBinder,
  resolveParameters,
} from '@application/orchestration/core/ParameterBinder.js';
import {
  definePackage,
  PipelinePackage,
} from '@domain/pipeline/PipelinePackage.js';
import { PipelineDefinition } from '@domain/pipeline/PipelineDefinition.js';
import { ErrorType } from '@domain/errors/CoreErrorTypes.js';
import {
  captureError,
  LoggerMock,
  MockFactory,
} from '../../../../utils/test-mocks.js';

const schema = z.object({
  sigma: z.number().positive().default(1),
  mode: z.enum(['fast', 'full']).default('fast'),
});

describe('resolveParameters', () => {
  test('未提供的参数使用默认值', () => {
    expect(resolveParameters(schema, {}, {}, 'T1proc')).toEqual({
      sigma: 1,
      mode: 'fast',
    });
  });

  test('更新覆盖当前值', () => {
    expect(
      resolveParameters(schema, { sigma: 2, mode: 'full' }, { sigma: 3 }, 'T1proc'),
    ).toEqual({ sigma: 3, mode: 'full' });
  });

  test('未声明的参数名被拒绝', () => {
    expect(
      captureError(() => resolveParameters(schema, {}, { gamma: 2 }, 'T1proc')),
    ).toMatchObject({
      type: ErrorType.UNKNOWN_PARAMETER_NAME,
      message: "Parameter 'gamma' is not declared by this package",
      context: { packageTitle: 'T1proc' },
    });
  });

  test('非法的参数值指出参数名', () => {
    expect(
      captureError(() => resolveParameters(schema, {}, { mode: 'slow' }, 'T1proc')),
    ).toMatchObject({
      type: ErrorType.INVALID_PARAMETER_VALUE,
      details: { name: 'mode' },
    });
  });
});

describe('ParameterBinder', () => {
  let logger: LoggerMock;
  let definition: PipelineDefinition;
  let binder: ParameterBinder;

  beforeEach(() => {
    logger = MockFactory.createLoggerMock();
    const pkg: PipelinePackage = definePackage({
      title: 'T1proc',
      parameters: schema,
      register: (registrar) => {
        registrar.step('denoise', () => undefined);
      },
    });
    definition = new PipelineDefinition(
      pkg,
      MockFactory.createProcessingInterface('T1proc'),
      { sigma: 1, mode: 'fast' },
      logger,
    );
    binder = new ParameterBinder(
      definition,
      { sigma: 1, mode: 'fast' },
      logger,
    );
  });

  test('只暴露声明的参数', () => {
    expect(binder.names()).toEqual(['sigma', 'mode']);
    expect(binder.getAll()).toEqual({ sigma: 1, mode: 'fast' });
  });

  test('设置单个参数', () => {
    binder.set('sigma', 2);

    expect(binder.get('sigma')).toBe(2);
    expect(definition.params).toEqual({ sigma: 2, mode: 'fast' });
  });

  test('读取未声明的参数报错', () => {
    expect(captureError(() => binder.get('denoise'))).toMatchObject({
      type: ErrorType.UNKNOWN_PARAMETER_NAME,
    });
  });

  test('批量设置中任一值非法时不写入任何值', () => {
    expect(
      captureError(() => binder.apply({ sigma: 5, mode: 'slow' })),
    ).toMatchObject({ type: ErrorType.INVALID_PARAMETER_VALUE });
    expect(binder.getAll()).toEqual({ sigma: 1, mode: 'fast' });
  });

  test('空更新不做任何事', () => {
    binder.apply({});

    expect(logger.debug).not.toHaveBeenCalled();
    expect(binder.getAll()).toEqual({ sigma: 1, mode: 'fast' });
  });

  test('带 transform 的参数不会被再次解析', () => {
    const pkg: PipelinePackage = definePackage({
      title: 'T1proc',
      parameters: z.object({
        subjects: z.string().transform((value) => value.split(',')),
        sigma: z.number().default(1),
      }),
      register: () => undefined,
    });
    const inputs = { subjects: 'sub-01,sub-02' };
    const transformed = new PipelineDefinition(
      pkg,
      MockFactory.createProcessingInterface('T1proc'),
      resolveParameters(pkg.parameters, {}, inputs, 'T1proc'),
      logger,
    );
    const transformedBinder = new ParameterBinder(transformed, inputs, logger);

    transformedBinder.set('sigma', 2);
    expect(transformedBinder.getAll()).toEqual({
      subjects: ['sub-01', 'sub-02'],
      sigma: 2,
    });

    transformedBinder.set('subjects', 'sub-03');
    expect(transformedBinder.getAll()).toEqual({
      subjects: ['sub-03'],
      sigma: 2,
    });
  });
});
