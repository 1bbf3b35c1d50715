import { Logger } from '@logging/logger.js';
import type { PipelineDefinition } from '@domain/pipeline/PipelineDefinition.js';
import type {
  ParameterSchema,
  ParameterValues,
} from '@domain/pipeline/PipelinePackage.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';

/**
 * 按 schema 校验参数更新，返回合并后的完整参数
 *
 * 所有键先检查是否已声明，再整体校验；任何一项失败都不会产生部分结果。
 * @param schema 参数 schema
 * @param base 当前参数
 * @param updates 参数更新
 * @param packageTitle 包标题，用于错误上下文
 * @returns 合并并校验后的参数
 * @throws UNKNOWN_PARAMETER_NAME 更新中有未声明的参数
 * @throws INVALID_PARAMETER_VALUE 参数值未通过校验
 */
export function resolveParameters<S extends ParameterSchema>(
  schema: S,
  base: Readonly<Record<string, unknown>>,
  updates: Readonly<Record<string, unknown>>,
  packageTitle: string,
): ParameterValues<S> {
  const known = Object.keys(schema.shape);
  for (const name of Object.keys(updates)) {
    if (!known.includes(name)) {
      throw CoreErrorFactory.unknownParameterName(name, known, {
        packageTitle,
      });
    }
  }

  const result = schema.safeParse({ ...base, ...updates });
  if (!result.success) {
    const [first] = result.error.issues;
    const field = first?.path[0];
    const name = field === undefined ? '(root)' : String(field);
    const issues = result.error.issues
      .filter((issue) => issue.path[0] === field)
      .map((issue) => issue.message);
    throw CoreErrorFactory.invalidParameterValue(name, issues, {
      packageTitle,
    });
  }
  return result.data;
}

/**
 * 参数绑定器
 * 只暴露包声明的参数（不含步骤与保留名），不允许临时创建新参数。
 * 校验总是基于调用方给出的原始输入，schema 的 transform 结果不会被再次解析。
 */
export class ParameterBinder {
  private inputs: Readonly<Record<string, unknown>>;

  /**
   * 创建 ParameterBinder 实例
   * @param definition 包实例
   * @param inputs 生成当前参数值的原始输入
   * @param logger 日志记录器
   */
  constructor(
    private readonly definition: PipelineDefinition,
    inputs: Readonly<Record<string, unknown>>,
    private readonly logger: Logger,
  ) {
    this.inputs = { ...inputs };
  }

  /**
   * 已声明的参数名
   * @returns 参数名列表
   */
  names(): string[] {
    return Object.keys(this.definition.parameterSchema.shape);
  }

  /**
   * 获取全部参数的当前值
   * @returns 参数名 → 参数值
   */
  getAll(): Record<string, unknown> {
    return { ...this.definition.params };
  }

  /**
   * 获取单个参数值
   * @param name 参数名
   * @returns 参数值
   * @throws UNKNOWN_PARAMETER_NAME 参数未声明
   */
  get(name: string): unknown {
    if (!this.names().includes(name)) {
      throw CoreErrorFactory.unknownParameterName(name, this.names(), {
        packageTitle: this.definition.title,
      });
    }
    return this.getAll()[name];
  }

  /**
   * 设置单个参数
   * @param name 参数名
   * @param value 参数值
   */
  set(name: string, value: unknown): void {
    this.apply({ [name]: value });
  }

  /**
   * 批量设置参数，全部校验通过后才写入
   * @param updates 参数更新
   */
  apply(updates: Readonly<Record<string, unknown>>): void {
    if (Object.keys(updates).length === 0) {
      return;
    }
    const values = resolveParameters(
      this.definition.parameterSchema,
      this.inputs,
      updates,
      this.definition.title,
    );
    this.inputs = { ...this.inputs, ...updates };
    this.definition.replaceParams(values);
    this.logger.debug(`[${this.definition.title}] 参数已更新`, {
      names: Object.keys(updates),
    });
  }
}
