import type {
  DatasetCategory,
  DatasetFilter,
  DatasetView,
} from '@domain/entities/types.js';

/**
 * 数据集存储协作方（Bucket）接口
 * 负责数据集的索引与查询，编排器只共享使用，不持有
 */
export interface IBucket {
  /** 数据集根路径 */
  readonly path: string;

  /** 数据集摘要文本 */
  readonly summary: string;

  /**
   * 重新扫描数据集，刷新索引
   */
  update(): void;

  /**
   * 按类别和过滤条件查询数据（返回副本视图）
   * @param category 数据类别
   * @param filter 过滤条件
   * @returns 过滤后的数据集视图
   */
  select(category: DatasetCategory, filter: DatasetFilter): DatasetView;
}

/**
 * 根据数据集路径创建存储协作方
 */
export type BucketFactory = (datasetPath: string) => IBucket;
