import { errorMessage, type Logger } from "./logger.js";
import type { StorageClient, StorageClientFactory } from "./ports/storage.js";
import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";
import type { Task } from "./task.js";
import type { TaskQueue } from "./task-queue.js";
import { invalidOption, transferFailed } from "./errors/catalog.js";
import { isDownloadError, type DownloadError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConnectionPoolOptions {
  /** Number of connections, i.e. the maximum number of concurrent transfers */
  size: number;
  /** Ready queue the connections claim tasks from */
  queue: TaskQueue<Task>;
  /** Called once per connection; clients are never shared */
  createClient: StorageClientFactory;
  logger: Logger;
  /** Bounded wait for each pop from the ready queue */
  pollTimeoutMs?: number;
  /** Per-connection wait during stop() before giving up on it */
  joinTimeoutMs?: number;
  timers?: TimerService;
  /** A task's transfer rejected */
  onTaskFailed?: (task: Task, error: DownloadError) => void;
  /** A task left its connection, whatever the outcome */
  onTaskSettled?: (task: Task) => void;
}

interface ConnectionContext {
  queue: TaskQueue<Task>;
  pollTimeoutMs: number;
  isRunning: () => boolean;
  onTaskFailed?: (task: Task, error: DownloadError) => void;
  onTaskSettled?: (task: Task) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_POLL_TIMEOUT_MS = 1000;
const DEFAULT_JOIN_TIMEOUT_MS = 30000;

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

/**
 * One worker loop bound to one storage client. Runs claimed tasks one at a
 * time until the pool stops.
 */
export class Connection {
  private loop: Promise<void> | undefined;
  private current: Task | undefined;

  constructor(
    readonly index: number,
    private readonly client: StorageClient,
    private readonly ctx: ConnectionContext,
    private readonly logger: Logger
  ) {}

  /** Task currently executing on this connection */
  get activeTask(): Task | undefined {
    return this.current;
  }

  get isRunning(): boolean {
    return this.loop !== undefined;
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run().finally(() => {
      this.loop = undefined;
    });
  }

  /** Resolves once the loop has exited */
  join(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    this.logger.debug("Connection started");

    while (this.ctx.isRunning()) {
      const task = await this.ctx.queue.pop(this.ctx.pollTimeoutMs);
      if (task) {
        await this.execute(task);
      }
    }

    this.logger.debug("Connection stopped");
  }

  private async execute(task: Task): Promise<void> {
    this.current = task;
    this.logger.debug("Claimed task", { taskId: task.id, key: task.key });

    try {
      await task.start(this.client);
    } catch (err) {
      const error = isDownloadError(err) ? err : transferFailed(task.id, task.key, err);
      this.logger.error(error.message, {
        taskId: task.id,
        code: error.code,
        error: error.details,
      });
      this.invokeHook("onTaskFailed", () => this.ctx.onTaskFailed?.(task, error));
    } finally {
      this.current = undefined;
      this.invokeHook("onTaskSettled", () => this.ctx.onTaskSettled?.(task));
    }
  }

  private invokeHook(name: string, hook: () => void): void {
    try {
      hook();
    } catch (err) {
      this.logger.error("Connection hook failed", {
        hook: name,
        error: errorMessage(err),
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

/**
 * Fixed set of connections sharing one ready queue. The pool size is the
 * only admission control: the queue itself is unbounded.
 */
export class ConnectionPool {
  private readonly connections: Connection[];
  private readonly queue: TaskQueue<Task>;
  private readonly logger: Logger;
  private readonly joinTimeoutMs: number;
  private readonly timers: TimerService;
  private running = false;

  constructor(options: ConnectionPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw invalidOption("workers", `Pool size must be a positive integer, got ${options.size}`);
    }

    this.queue = options.queue;
    this.logger = options.logger.child({ component: "connection-pool" });
    this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
    this.timers = options.timers ?? realTimerService;

    const ctx: ConnectionContext = {
      queue: options.queue,
      pollTimeoutMs: options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS,
      isRunning: () => this.running,
      onTaskFailed: options.onTaskFailed,
      onTaskSettled: options.onTaskSettled,
    };

    this.connections = Array.from(
      { length: options.size },
      (_, index) =>
        new Connection(
          index,
          options.createClient(index),
          ctx,
          options.logger.child({ component: "connection", connection: index })
        )
    );
  }

  get size(): number {
    return this.connections.length;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Number of connections currently executing a task */
  activeCount(): number {
    return this.connections.filter((c) => c.activeTask !== undefined).length;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (const connection of this.connections) {
      connection.start();
    }
    this.logger.info("Connection pool started", { size: this.size });
  }

  /**
   * Stop claiming tasks and wait for every connection to finish its current
   * transfer, each bounded by the join timeout. Unclaimed tasks stay queued.
   */
  async stop(): Promise<void> {
    if (!this.running && !this.connections.some((c) => c.isRunning)) return;

    this.running = false;
    this.queue.wake();
    this.logger.info("Stopping connection pool", {
      active: this.activeCount(),
      queued: this.queue.size(),
    });

    await Promise.all(this.connections.map((c) => this.join(c)));

    this.logger.info("Connection pool stopped", { queued: this.queue.size() });
  }

  private async join(connection: Connection): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = this.timers.setTimeout(() => resolve("timeout"), this.joinTimeoutMs);
    });

    const outcome = await Promise.race([
      connection.join().then(() => "joined" as const),
      timedOut,
    ]);
    if (timer) this.timers.clearTimeout(timer);

    if (outcome === "timeout") {
      this.logger.warn("Connection did not stop within join timeout", {
        connection: connection.index,
        joinTimeoutMs: this.joinTimeoutMs,
        taskId: connection.activeTask?.id,
      });
    }
  }
}
