/**
 * PipelineDefinition - 绑定到处理接口的包实例
 */

import type { IProcessingInterface } from '@domain/interfaces/processing.js';
import { Logger, scopedLogger } from '@logging/logger.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';
import type {
  ParameterSchema,
  ParameterValues,
  PipelinePackage,
  PipelineStep,
  StepContext,
  StepHandler,
  StepRegistrar,
} from './PipelinePackage.js';

/**
 * 包实例
 * 持有包声明的步骤（按注册顺序）和当前参数值
 */
export class PipelineDefinition<S extends ParameterSchema = ParameterSchema> {
  readonly steps: readonly PipelineStep<ParameterValues<S>>[];
  private values: ParameterValues<S>;

  /**
   * 创建包实例
   * @param pkg 插件包
   * @param processing 处理接口
   * @param params 已校验的初始参数
   * @param logger 日志记录器
   */
  constructor(
    readonly pkg: PipelinePackage<S>,
    readonly processing: IProcessingInterface,
    params: ParameterValues<S>,
    private readonly logger: Logger,
  ) {
    this.steps = collectSteps(pkg);
    this.values = params;
  }

  /** 包标题 */
  get title(): string {
    return this.pkg.title;
  }

  /** 参数 schema */
  get parameterSchema(): S {
    return this.pkg.parameters;
  }

  /** 当前参数 */
  get params(): Readonly<ParameterValues<S>> {
    return this.values;
  }

  /**
   * 整体替换参数值（调用方负责校验）
   * @param values 新参数值
   */
  replaceParams(values: ParameterValues<S>): void {
    this.values = values;
  }

  /**
   * 构造步骤执行上下文
   * @returns 上下文
   */
  createContext(): StepContext<ParameterValues<S>> {
    return {
      title: this.title,
      processing: this.processing,
      params: { ...this.values },
      logger: scopedLogger(this.logger, this.title),
    };
  }
}

/**
 * 调用包的 register，按注册顺序收集步骤
 */
function collectSteps<S extends ParameterSchema>(
  pkg: PipelinePackage<S>,
): PipelineStep<ParameterValues<S>>[] {
  const steps: PipelineStep<ParameterValues<S>>[] = [];
  const registrar: StepRegistrar<ParameterValues<S>> = {
    step(
      name: string,
      run: StepHandler<ParameterValues<S>>,
      description?: string,
    ): StepRegistrar<ParameterValues<S>> {
      if (name.trim() === '') {
        throw CoreErrorFactory.configuration(
          `Package '${pkg.title}' registers a step without a name`,
        );
      }
      if (steps.some((existing) => existing.name === name)) {
        throw CoreErrorFactory.configuration(
          `Package '${pkg.title}' registers step '${name}' twice`,
          { title: pkg.title, step: name },
        );
      }
      steps.push({ name, run, description });
      return registrar;
    },
  };
  pkg.register(registrar);
  return steps;
}
