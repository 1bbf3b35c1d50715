/**
 * PipelinePackage - 插件包契约
 * 包通过显式的 register 调用声明步骤，通过 Zod schema 声明参数
 */

import { z } from 'zod';
import type { IProcessingInterface } from '@domain/interfaces/processing.js';
import type { Logger } from '@logging/logger.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';

/**
 * 不能用作参数名的保留名（以 '_' 开头的名称同样保留）
 */
export const RESERVED_PARAMETER_NAMES: readonly string[] = [
  'installedPipelines',
  'interface',
];

/**
 * 任意参数 schema
 */
export type ParameterSchema = z.AnyZodObject;

/**
 * 参数值对象
 */
export type ParameterValues<S extends ParameterSchema = ParameterSchema> =
  z.infer<S>;

/**
 * 步骤执行上下文
 */
export interface StepContext<P = ParameterValues> {
  /** 包标题 */
  readonly title: string;
  /** 处理接口，步骤通过它写入产出并推进任务计数 */
  readonly processing: IProcessingInterface;
  /** 当前参数 */
  readonly params: Readonly<P>;
  /** 消息带 `[包标题]` 前缀 */
  readonly logger: Logger;
}

/**
 * 步骤实现
 */
export type StepHandler<P = ParameterValues> = (
  context: StepContext<P>,
) => void | Promise<void>;

/**
 * 已注册的步骤
 */
export interface PipelineStep<P = ParameterValues> {
  readonly name: string;
  readonly description?: string;
  readonly run: StepHandler<P>;
}

/**
 * 步骤注册器，包在 register 中通过它声明步骤
 */
export interface StepRegistrar<P = ParameterValues> {
  /**
   * 注册一个步骤，序号按注册顺序从 0 开始分配
   * @param name 步骤名
   * @param run 步骤实现
   * @param description 步骤说明
   * @returns 注册器本身，支持链式调用
   */
  step(name: string, run: StepHandler<P>, description?: string): StepRegistrar<P>;
}

/**
 * 插件包
 */
export interface PipelinePackage<S extends ParameterSchema = ParameterSchema> {
  /** 包标题 */
  readonly title: string;
  /** 包说明（howto 输出的内容） */
  readonly description?: string;
  /** 参数 schema，每个字段即一个可配置参数 */
  readonly parameters: S;
  /**
   * 声明步骤
   * @param registrar 步骤注册器
   */
  register(registrar: StepRegistrar<ParameterValues<S>>): void;
}

/**
 * 检查参数名是否为保留名
 * @param name 参数名
 * @returns 是否保留
 */
export function isReservedParameterName(name: string): boolean {
  return name.startsWith('_') || RESERVED_PARAMETER_NAMES.includes(name);
}

/**
 * 定义一个插件包，并校验参数名
 * @param pkg 包定义
 * @returns 原样返回的包定义
 * @throws CONFIGURATION_ERROR 标题为空或参数名为保留名
 */
export function definePackage<S extends ParameterSchema>(
  pkg: PipelinePackage<S>,
): PipelinePackage<S> {
  if (pkg.title.trim() === '') {
    throw CoreErrorFactory.configuration('Package title must not be empty');
  }
  const reserved = Object.keys(pkg.parameters.shape).filter(
    isReservedParameterName,
  );
  if (reserved.length > 0) {
    throw CoreErrorFactory.configuration(
      `Package '${pkg.title}' declares reserved parameter names: ${reserved.join(', ')}`,
      { title: pkg.title, reserved },
    );
  }
  return pkg;
}

/**
 * 创建没有步骤和参数的空包，用于临时（未注册）的包标题
 * @param title 包标题
 * @returns 空包
 */
export function createEmptyPackage(title: string): PipelinePackage {
  return definePackage({
    title,
    description: `Temporary pipeline package [${title}]`,
    parameters: z.object({}),
    register: () => undefined,
  });
}
