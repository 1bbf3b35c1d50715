import { Logger } from '@logging/logger.js';
import type { PipelineDefinition } from '@domain/pipeline/PipelineDefinition.js';
import type { PipelineStep } from '@domain/pipeline/PipelinePackage.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';

/**
 * 步骤注册表
 * 把包实例声明的步骤按注册顺序映射为 序号 → 步骤，通过序号调用
 */
export class StepRegistry {
  private readonly steps: ReadonlyMap<number, PipelineStep>;

  /**
   * 创建 StepRegistry 实例
   * @param definition 包实例
   * @param logger 日志记录器
   */
  constructor(
    private readonly definition: PipelineDefinition,
    private readonly logger: Logger,
  ) {
    this.steps = new Map(
      definition.steps.map((step, index): [number, PipelineStep] => [
        index,
        step,
      ]),
    );
  }

  /**
   * 已注册的步骤数量
   */
  get count(): number {
    return this.steps.size;
  }

  /**
   * 获取 序号 → 步骤名 映射
   * @returns 步骤名映射
   */
  names(): ReadonlyMap<number, string> {
    return new Map(
      Array.from(this.steps, ([index, step]): [number, string] => [
        index,
        step.name,
      ]),
    );
  }

  /**
   * 按序号获取步骤
   * @param index 步骤序号
   * @returns 步骤
   * @throws UNKNOWN_STEP_INDEX 序号不在 [0, count) 内
   */
  get(index: number): PipelineStep {
    const step = Number.isInteger(index) ? this.steps.get(index) : undefined;
    if (!step) {
      throw CoreErrorFactory.unknownStepIndex(index, this.count, {
        packageTitle: this.definition.title,
      });
    }
    return step;
  }

  /**
   * 获取步骤说明
   * @param index 步骤序号
   * @returns 步骤说明，没有说明时为 undefined
   */
  describe(index: number): string | undefined {
    return this.get(index).description;
  }

  /**
   * 调用步骤
   * 步骤通过处理接口产生输出，这里只负责分发
   * @param index 步骤序号
   */
  async invoke(index: number): Promise<void> {
    const step = this.get(index);
    const startTime = Date.now();

    this.logger.info(`[${this.definition.title}] 开始执行步骤 '${step.name}'`, {
      index,
    });
    try {
      await step.run(this.definition.createContext());
    } catch (error) {
      const failure = CoreErrorFactory.fromError(error, {
        operation: 'run',
        packageTitle: this.definition.title,
        stepName: step.name,
      });
      this.logger.error(
        `[${this.definition.title}] 步骤 '${step.name}' 执行失败: ${failure.message}`,
        { index, duration: Date.now() - startTime, error: failure.toJSON() },
      );
      // 步骤错误原样交给调用方
      throw error;
    }
    this.logger.info(`[${this.definition.title}] 步骤 '${step.name}' 完成`, {
      index,
      duration: Date.now() - startTime,
    });
  }
}
