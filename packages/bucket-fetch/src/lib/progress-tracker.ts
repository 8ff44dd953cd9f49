import { errorMessage, type Logger } from "./logger.js";
import type { ProgressMap } from "./progress-map.js";
import type { ProgressSink } from "./ports/progress-sink.js";
import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";

export interface ProgressTrackerOptions {
  progress: ProgressMap;
  sink: ProgressSink;
  logger: Logger;
  /** Time between renders */
  intervalMs?: number;
  timers?: TimerService;
}

const DEFAULT_INTERVAL_MS = 2000;

/**
 * Periodically renders a snapshot of the progress map.
 * Runs on its own timer, independent of the connections.
 */
export class ProgressTracker {
  private readonly progress: ProgressMap;
  private readonly sink: ProgressSink;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly timers: TimerService;
  private timer: NodeJS.Timeout | undefined;
  private running = false;

  constructor(options: ProgressTrackerOptions) {
    this.progress = options.progress;
    this.sink = options.sink;
    this.logger = options.logger.child({ component: "progress-tracker" });
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.timers = options.timers ?? realTimerService;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.render();
    this.schedule();
  }

  /**
   * Cancel the next tick, draw the final state and release the sink.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.timer) {
      this.timers.clearTimeout(this.timer);
      this.timer = undefined;
    }

    this.render();
    try {
      this.sink.done();
    } catch (err) {
      this.logger.warn("Progress sink failed to close", { error: errorMessage(err) });
    }
    this.logger.debug("Progress tracker stopped");
  }

  /** Lines for the current snapshot, `<task id>: <status>` */
  snapshotLines(): string[] {
    return this.progress.snapshot().map(([taskId, status]) => `${taskId}: ${status}`);
  }

  private schedule(): void {
    this.timer = this.timers.setTimeout(() => {
      this.timer = undefined;
      if (!this.running) return;
      this.render();
      this.schedule();
    }, this.intervalMs);
  }

  private render(): void {
    try {
      this.sink.render(this.snapshotLines());
    } catch (err) {
      this.logger.warn("Progress render failed", { error: errorMessage(err) });
    }
  }
}
