/**
 * 编排模块主导出文件
 */

// 核心编排组件
export * from './core/index.js';

// 编排器
export { PipelineOrchestrator } from './PipelineOrchestrator.js';
export type {
  OrchestratorCollaborators,
  OrchestratorOptions,
} from './PipelineOrchestrator.js';
