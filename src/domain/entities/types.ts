/**
 * 插件包在一次发现过程中的序号（从 0 开始、连续）
 */
export type PackageIndex = number;

/**
 * 数据类别，按固定优先级解析：processed > reported > masked
 */
export type DatasetCategory = 'processed' | 'reported' | 'masked';

/**
 * 数据类别的探测顺序
 */
export const DATASET_CATEGORY_PRIORITY: readonly DatasetCategory[] = [
  'processed',
  'reported',
  'masked',
] as const;

/**
 * 删除已产生数据时的模式
 */
export type RemovalMode = 'processing' | 'reporting' | 'masking';

/**
 * 存储查询过滤条件
 * 类别键（steps / reports / datatypes）三者只会出现一个
 */
export interface DatasetFilter {
  pipelines?: string; // 包标签，masked 类别不设置
  ext: string;
  regex?: string;
  steps?: string;
  reports?: string;
  datatypes?: string;
}

/**
 * 数据集中的单条记录
 */
export interface DatasetRecord {
  path: string;
  subject?: string;
  session?: string;
  [key: string]: unknown;
}

/**
 * 经过过滤的数据集视图（由存储协作方返回）
 */
export interface DatasetView {
  readonly category: DatasetCategory;
  readonly filter: DatasetFilter;
  readonly records: readonly DatasetRecord[];
}

/**
 * 任务计数器快照
 */
export interface JobCounterSnapshot {
  readonly queued: number;
  readonly finished: number;
}

/**
 * 已选包的状态
 */
export type SelectionState = 'unselected' | 'selected';

/**
 * 绑定新鲜度
 */
export type BindingState = 'stale' | 'fresh';
