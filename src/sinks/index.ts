export type { ISink } from './ISink.js';
export { DELIVERED, failed } from './ISink.js';
export { StreamSink, type StreamSinkOptions } from './StreamSink.js';
export { MemorySink, type MemorySinkEntry } from './MemorySink.js';
export { CloudWatchSink, type CloudWatchSinkOptions } from './CloudWatchSink.js';
export { GoogleCloudSink, type GoogleCloudSinkOptions } from './GoogleCloudSink.js';
export { AzureMonitorSink, type AzureMonitorSinkOptions } from './AzureMonitorSink.js';
export { BatchWorker, type BatchWorkerOptions } from './BatchWorker.js';
