/**
 * 公共入口
 */

export * from './application/orchestration/index.js';

export * from './domain/entities/types.js';
export {
  StepCodeSchema,
  StepCodeListSchema,
  isStepCode,
} from './domain/entities/step-code.js';
export type { StepCode } from './domain/entities/step-code.js';
export * from './domain/errors/index.js';
export type * from './domain/interfaces/index.js';
export * from './domain/pipeline/index.js';
export { JobCounters } from './domain/services/JobCounters.js';

export { PackageCatalog } from './infrastructure/plugins/PackageCatalog.js';
export * from './infrastructure/progress/index.js';
export { validateConfig } from './infrastructure/config/config.js';
export type { AppConfig } from './infrastructure/config/config.js';
export {
  createLogger,
  logger,
  scopedLogger,
} from './infrastructure/logging/logger.js';
export type { Logger } from './infrastructure/logging/logger.js';
