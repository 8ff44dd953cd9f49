export { systemClock } from "./system-clock.js";
export { realTimerService } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createOraProgressSink } from "./ora-progress-sink.js";
export { createLogProgressSink, silentProgressSink } from "./log-progress-sink.js";
export { createS3StorageClient, createS3ClientFactory } from "./s3-storage.js";
