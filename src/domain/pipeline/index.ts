export {
  definePackage,
  createEmptyPackage,
  isReservedParameterName,
  RESERVED_PARAMETER_NAMES,
} from './PipelinePackage.js';
export type {
  PipelinePackage,
  PipelineStep,
  ParameterSchema,
  ParameterValues,
  StepContext,
  StepHandler,
  StepRegistrar,
} from './PipelinePackage.js';
export { PipelineDefinition } from './PipelineDefinition.js';
