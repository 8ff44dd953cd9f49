export type { Clock } from "./clock.js";
export type { TimerService } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type {
  StorageClient,
  StorageClientFactory,
  DownloadRequest,
  ProgressCallback,
} from "./storage.js";
export type { ProgressSink } from "./progress-sink.js";
