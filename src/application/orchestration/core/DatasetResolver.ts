import { Logger } from '@logging/logger.js';
import {
  DATASET_CATEGORY_PRIORITY,
  DatasetCategory,
  DatasetFilter,
  DatasetView,
} from '@domain/entities/types.js';
import type { IBucket } from '@domain/interfaces/bucket.js';
import type { IProcessingInterface } from '@domain/interfaces/processing.js';

/** 默认的数据文件扩展名 */
export const DEFAULT_DATASET_EXTENSION = 'nii.gz';

/**
 * 步骤代码解析结果
 */
export interface ResolvedDataset {
  category: DatasetCategory;
  /** 该步骤代码在存储中的路径/名称 */
  path: string;
}

/**
 * 数据查询选项
 */
export interface DatasetQueryOptions {
  /** 文件扩展名，默认 nii.gz */
  ext?: string;
  /** 文件名匹配模式 */
  regex?: string;
}

type CategoryFilterKey = 'steps' | 'reports' | 'datatypes';

const CATEGORY_FILTER_KEYS: Record<DatasetCategory, CategoryFilterKey> = {
  processed: 'steps',
  reported: 'reports',
  masked: 'datatypes',
};

/**
 * 数据集解析器
 * 按 processed → reported → masked 的顺序探测步骤代码所属的类别，并构造存储查询
 */
export class DatasetResolver {
  /**
   * 创建 DatasetResolver 实例
   * @param processing 处理接口（提供三个命名空间）
   * @param bucket 存储协作方（共享，不持有）
   * @param logger 日志记录器
   */
  constructor(
    private readonly processing: IProcessingInterface,
    private readonly bucket: IBucket,
    private readonly logger: Logger,
  ) {}

  /**
   * 解析步骤代码
   * @param stepCode 步骤代码
   * @returns 第一个包含该代码的命名空间对应的类别和路径；都不包含时返回 null
   */
  resolve(stepCode: string): ResolvedDataset | null {
    for (const category of DATASET_CATEGORY_PRIORITY) {
      const path = this.namespaceOf(category).get(stepCode);
      if (path !== undefined) {
        return { category, path };
      }
    }
    return null;
  }

  /**
   * 构造查询过滤条件
   * masked 类别不按包过滤，不设置 pipelines
   * @param resolved 解析结果
   * @param options 查询选项
   * @returns 过滤条件
   */
  buildFilter(
    resolved: ResolvedDataset,
    options: DatasetQueryOptions = {},
  ): DatasetFilter {
    const filter: DatasetFilter = {
      ext: options.ext ?? DEFAULT_DATASET_EXTENSION,
    };
    if (resolved.category !== 'masked') {
      filter.pipelines = this.processing.label;
    }
    if (options.regex !== undefined) {
      filter.regex = options.regex;
    }
    filter[CATEGORY_FILTER_KEYS[resolved.category]] = resolved.path;
    return filter;
  }

  /**
   * 查询步骤代码对应的数据
   * @param stepCode 步骤代码
   * @param options 查询选项
   * @returns 数据集视图；没有数据时返回 null
   */
  query(stepCode: string, options: DatasetQueryOptions = {}): DatasetView | null {
    this.processing.update();
    const resolved = this.resolve(stepCode);
    if (!resolved) {
      this.logger.debug(`步骤代码 '${stepCode}' 没有对应的数据`);
      return null;
    }
    const filter = this.buildFilter(resolved, options);
    this.logger.debug(`查询数据: ${stepCode} (${resolved.category})`, filter);
    return this.bucket.select(resolved.category, filter);
  }

  private namespaceOf(category: DatasetCategory): ReadonlyMap<string, string> {
    switch (category) {
      case 'processed':
        return this.processing.executed;
      case 'reported':
        return this.processing.reported;
      case 'masked':
        return this.processing.masked;
    }
  }
}
