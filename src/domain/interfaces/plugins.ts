import type { PipelinePackage } from '@domain/pipeline/PipelinePackage.js';
import type { PackageIndex } from '@domain/entities/types.js';
import type { ProcessingInterfaceFactory } from './processing.js';

/**
 * 插件加载协作方接口
 */
export interface IPluginLoader {
  /** 已安装的包：序号 → 标题（从 0 开始连续） */
  readonly availablePackages: ReadonlyMap<PackageIndex, string>;

  /** 用于为选中的包创建处理接口 */
  readonly createInterface: ProcessingInterfaceFactory;

  /**
   * 按序号或标题查找包
   * @param key 包序号或标题
   * @returns 包定义，不存在时返回 undefined
   */
  getPackage(key: PackageIndex | string): PipelinePackage | undefined;
}
