export type { IBucket, BucketFactory } from './bucket.js';
export type { JobCounterSource, JobCounterListener } from './job-counters.js';
export type {
  IProcessingInterface,
  ProcessingInterfaceFactory,
  ProcessingInterfaceOptions,
  RunningStep,
  SchedulerHandle,
  ManagerHandle,
} from './processing.js';
export type { IPluginLoader } from './plugins.js';
export type { ProgressSink } from './progress.js';
