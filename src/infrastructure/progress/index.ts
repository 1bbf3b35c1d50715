export { LoggerProgressSink } from './LoggerProgressSink.js';
export { EventProgressSink } from './EventProgressSink.js';
export type { ProgressEvents } from './EventProgressSink.js';
