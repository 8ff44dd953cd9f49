import type { Contract } from "./contract.js";
import { errorMessage, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { ProgressSink } from "./ports/progress-sink.js";
import type { StorageClientFactory } from "./ports/storage.js";
import type { TimerService } from "./ports/timer.js";
import type { FailurePolicy } from "./config.js";
import type { DownloadError } from "./errors/types.js";
import { systemClock } from "./adapters/system-clock.js";
import { silentProgressSink } from "./adapters/log-progress-sink.js";
import { ConnectionPool } from "./connection-pool.js";
import { CompletionObserver, ProgressObserver } from "./observer.js";
import { ProgressMap } from "./progress-map.js";
import { ProgressTracker } from "./progress-tracker.js";
import { Task, type TaskState } from "./task.js";
import { createTaskQueue, type TaskQueue } from "./task-queue.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadManagerOptions {
  /** Pool size: maximum number of concurrent transfers */
  workers: number;
  createClient: StorageClientFactory;
  logger: Logger;
  /** Where the progress tracker draws; nothing is drawn by default */
  sink?: ProgressSink;
  clock?: Clock;
  timers?: TimerService;
  pollTimeoutMs?: number;
  joinTimeoutMs?: number;
  progressIntervalMs?: number;
  /** What happens to a task whose transfer rejected */
  failurePolicy?: FailurePolicy;
}

export interface DownloadStats {
  /** Submitted, not yet handed to the connections */
  pending: number;
  /** Waiting in the ready queue */
  ready: number;
  /** Executing on a connection */
  running: number;
  complete: number;
  failed: number;
  /** Finished without a verifiable completion */
  incomplete: number;
  total: number;
  activeConnections: number;
}

type ManagerState = "idle" | "running" | "stopped";

const UNSETTLED: readonly TaskState[] = ["pending", "ready", "running"];

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Turns submitted contracts into tasks and runs them on a fixed pool of
 * connections.
 *
 * Each task moves pending → ready → complete (or failed) exactly once; the
 * manager owns every one of those moves.
 */
export class DownloadManager {
  private readonly pending: TaskQueue<Task>;
  private readonly ready: TaskQueue<Task>;
  private readonly complete: TaskQueue<Task>;
  private readonly failed: TaskQueue<Task>;
  private readonly progress = new ProgressMap();
  private readonly tasks: Task[] = [];

  private readonly pool: ConnectionPool;
  private readonly tracker: ProgressTracker;
  private readonly logger: Logger;
  private readonly taskLogger: Logger;
  private readonly clock: Clock;
  private readonly failurePolicy: FailurePolicy;

  private state: ManagerState = "idle";
  private stopping: Promise<void> | undefined;
  private idleWaiters: Array<() => void> = [];

  constructor(options: DownloadManagerOptions) {
    this.taskLogger = options.logger;
    this.logger = options.logger.child({ component: "download-manager" });
    this.clock = options.clock ?? systemClock;
    this.failurePolicy = options.failurePolicy ?? "mark-failed";

    this.pending = createTaskQueue<Task>(options.timers);
    this.ready = createTaskQueue<Task>(options.timers);
    this.complete = createTaskQueue<Task>(options.timers);
    this.failed = createTaskQueue<Task>(options.timers);

    this.pool = new ConnectionPool({
      size: options.workers,
      queue: this.ready,
      createClient: options.createClient,
      logger: options.logger,
      pollTimeoutMs: options.pollTimeoutMs,
      joinTimeoutMs: options.joinTimeoutMs,
      timers: options.timers,
      onTaskFailed: (task, error) => this.handleFailure(task, error),
      onTaskSettled: () => this.checkIdle(),
    });

    this.tracker = new ProgressTracker({
      progress: this.progress,
      sink: options.sink ?? silentProgressSink,
      logger: options.logger,
      intervalMs: options.progressIntervalMs,
      timers: options.timers,
    });
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  /**
   * Wrap a contract in a task. Before start() the task waits in the pending
   * queue; afterwards it goes straight to the ready queue.
   */
  submit(contract: Contract): Task {
    const task = new Task(contract, { logger: this.taskLogger, clock: this.clock });
    this.tasks.push(task);
    this.pending.push(task);
    this.logger.debug("Task submitted", { taskId: task.id, key: task.key });

    if (this.state === "running") {
      this.drainPending();
    } else if (this.state === "stopped") {
      this.logger.warn("Task submitted after stop, it will not run", { taskId: task.id });
    }
    return task;
  }

  /**
   * Hand every pending task to the connections and start the progress
   * tracker. No-op when already started.
   */
  start(): void {
    if (this.state === "running") return;
    if (this.state === "stopped") {
      this.logger.warn("Download manager cannot be restarted after stop");
      return;
    }

    this.state = "running";
    this.drainPending();
    this.tracker.start();
    this.pool.start();
    this.logger.info("Download manager started", {
      workers: this.pool.size,
      tasks: this.tasks.length,
    });
  }

  /**
   * Stop the pool, letting in-flight transfers finish, then the tracker.
   * Tasks not yet claimed remain in the ready queue. Repeated calls share
   * the first call's promise.
   */
  stop(signal?: NodeJS.Signals): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(signal);
    }
    return this.stopping;
  }

  /**
   * Resolves once no task is pending, ready or running, or once the manager
   * has stopped.
   */
  waitForIdle(): Promise<void> {
    if (this.state === "stopped" || this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStats(): DownloadStats {
    return {
      pending: this.pending.size(),
      ready: this.ready.size(),
      running: this.countState("running"),
      complete: this.complete.size(),
      failed: this.failed.size(),
      incomplete: this.countState("incomplete"),
      total: this.tasks.length,
      activeConnections: this.pool.activeCount(),
    };
  }

  getProgress(): Array<[taskId: string, status: string]> {
    return this.progress.snapshot();
  }

  /** Every submitted task, in submission order */
  getTasks(): Task[] {
    return [...this.tasks];
  }

  completedTasks(): Task[] {
    return this.complete.toArray();
  }

  failedTasks(): Task[] {
    return this.failed.toArray();
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private drainPending(): void {
    for (const task of this.pending.drain()) {
      task.attach(new CompletionObserver<Task>((done) => this.handleComplete(done)));
      task.attach(new ProgressObserver<Task>(this.progress, this.clock));
      task.markReady();
      this.ready.push(task);
    }
  }

  private handleComplete(task: Task): void {
    task.markComplete();
    this.complete.push(task);
    this.logger.info(`Download ${task.id} complete.`, {
      key: task.key,
      destination: task.destination,
    });
  }

  private handleFailure(task: Task, error: DownloadError): void {
    if (task.state !== "running") {
      this.logger.warn("Transfer error reported for a settled task", {
        taskId: task.id,
        state: task.state,
        code: error.code,
      });
      return;
    }

    if (this.failurePolicy === "mark-failed") {
      task.markFailed(error);
      this.failed.push(task);
      return;
    }

    task.markIncomplete(error);
    this.logger.warn("Failed task left unresolved", { taskId: task.id, code: error.code });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  private async shutdown(signal?: NodeJS.Signals): Promise<void> {
    const wasRunning = this.state === "running";
    this.state = "stopped";
    this.logger.info("Stopping download manager", { signal, ...this.getStats() });

    if (wasRunning) {
      try {
        await this.pool.stop();
      } catch (err) {
        this.logger.error("Connection pool failed to stop", { error: errorMessage(err) });
      }

      try {
        await this.tracker.stop();
      } catch (err) {
        this.logger.error("Progress tracker failed to stop", { error: errorMessage(err) });
      }
    }

    this.releaseIdleWaiters();
    this.logger.info("Download manager stopped", { ...this.getStats() });
  }

  private countState(state: TaskState): number {
    return this.tasks.filter((task) => task.state === state).length;
  }

  private isIdle(): boolean {
    return this.tasks.every((task) => !UNSETTLED.includes(task.state));
  }

  private checkIdle(): void {
    if (this.idleWaiters.length > 0 && this.isIdle()) {
      this.releaseIdleWaiters();
    }
  }

  private releaseIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
