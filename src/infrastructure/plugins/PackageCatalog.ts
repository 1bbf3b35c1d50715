import { Logger } from '@logging/logger.js';
import type { PackageIndex } from '@domain/entities/types.js';
import type { IPluginLoader } from '@domain/interfaces/plugins.js';
import type { ProcessingInterfaceFactory } from '@domain/interfaces/processing.js';
import type {
  ParameterSchema,
  PipelinePackage,
} from '@domain/pipeline/PipelinePackage.js';
import { definePackage } from '@domain/pipeline/PipelinePackage.js';
import { CoreErrorFactory } from '@domain/errors/CoreErrorFactory.js';

/**
 * 包目录
 * 进程内的插件加载实现：包通过 registerPackage 显式登记，序号按登记顺序从 0 开始分配
 */
export class PackageCatalog implements IPluginLoader {
  private readonly packages: PipelinePackage[] = [];

  /**
   * 创建 PackageCatalog 实例
   * @param createInterface 处理接口工厂
   * @param logger 日志记录器
   */
  constructor(
    readonly createInterface: ProcessingInterfaceFactory,
    private readonly logger: Logger,
  ) {}

  /**
   * 登记插件包
   * @param pkg 插件包
   * @returns 分配的包序号
   * @throws CONFIGURATION_ERROR 标题重复或参数名为保留名
   */
  registerPackage<S extends ParameterSchema>(
    pkg: PipelinePackage<S>,
  ): PackageIndex {
    definePackage(pkg);
    if (this.packages.some((existing) => existing.title === pkg.title)) {
      throw CoreErrorFactory.configuration(
        `Package '${pkg.title}' is already registered`,
        { title: pkg.title },
      );
    }
    this.packages.push(pkg);
    const index = this.packages.length - 1;
    this.logger.debug(`已登记插件包: ${index} : ${pkg.title}`);
    return index;
  }

  /**
   * 已安装的包：序号 → 标题
   */
  get availablePackages(): ReadonlyMap<PackageIndex, string> {
    return new Map(
      this.packages.map((pkg, index): [PackageIndex, string] => [
        index,
        pkg.title,
      ]),
    );
  }

  /**
   * 按序号或标题获取包
   * @param key 包序号或标题
   * @returns 插件包，不存在时返回 undefined
   */
  getPackage(key: PackageIndex | string): PipelinePackage | undefined {
    if (typeof key === 'number') {
      return Number.isInteger(key) ? this.packages[key] : undefined;
    }
    return this.packages.find((pkg) => pkg.title === key);
  }
}
