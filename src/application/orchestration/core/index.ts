/**
 * 编排器核心模块
 */

/** 步骤注册表 */
export { StepRegistry } from './StepRegistry.js';

/** 参数绑定 */
export { ParameterBinder, resolveParameters } from './ParameterBinder.js';

/** 数据集解析 */
export {
  DatasetResolver,
  DEFAULT_DATASET_EXTENSION,
} from './DatasetResolver.js';
export type {
  DatasetQueryOptions,
  ResolvedDataset,
} from './DatasetResolver.js';

/** 进度跟踪 */
export {
  ProgressTracker,
  DEFAULT_PROGRESS_INTERVAL_MS,
} from './ProgressTracker.js';
export type {
  ProgressReport,
  ProgressTrackerOptions,
} from './ProgressTracker.js';
