import type { Contract } from "./contract.js";
import type { Logger } from "./logger.js";
import type { Listener, Notifier, TransferView } from "./observer.js";
import type { Clock } from "./ports/clock.js";
import type { StorageClient } from "./ports/storage.js";
import { systemClock } from "./adapters/system-clock.js";
import { observerFailed, sizeProbeFailed, transferFailed } from "./errors/catalog.js";
import type { DownloadError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TaskState =
  | "pending"
  | "ready"
  | "running"
  | "complete"
  | "failed"
  | "incomplete";

export interface TaskOptions {
  logger: Logger;
  clock?: Clock;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * One transfer of a remote object to a local file.
 *
 * Listeners are held by composition and notified synchronously, on the
 * connection executing the task, every time the byte count moves.
 */
export class Task implements TransferView, Notifier<Task> {
  readonly id: string;
  readonly bucket: string;
  readonly key: string;
  readonly destination: string;
  readonly options: Readonly<Record<string, string>>;

  private _size: number | undefined;
  private _bytesTransferred = 0;
  private _startedAt: number | undefined;
  private _state: TaskState = "pending";
  private _error: DownloadError | undefined;

  private readonly listeners: Listener<Task>[] = [];
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(contract: Contract, options: TaskOptions) {
    this.id = contract.id;
    this.bucket = contract.bucket;
    this.key = contract.key;
    this.destination = contract.destination;
    this.options = contract.options;
    this.logger = options.logger.child({ taskId: contract.id });
    this.clock = options.clock ?? systemClock;
  }

  get size(): number | undefined {
    return this._size;
  }

  get bytesTransferred(): number {
    return this._bytesTransferred;
  }

  get startedAt(): number | undefined {
    return this._startedAt;
  }

  get state(): TaskState {
    return this._state;
  }

  get error(): DownloadError | undefined {
    return this._error;
  }

  /** True once the byte count has reached a known size */
  get isComplete(): boolean {
    return this._size !== undefined && this._bytesTransferred === this._size;
  }

  // -------------------------------------------------------------------------
  // Notifier
  // -------------------------------------------------------------------------

  attach(listener: Listener<Task>): void {
    if (this.listeners.includes(listener)) return;
    this.listeners.push(listener);
  }

  detach(listener: Listener<Task>): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) this.listeners.splice(index, 1);
  }

  notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener.update(this);
      } catch (err) {
        const error = observerFailed(this.id, err);
        this.logger.error(error.message, { code: error.code, error: error.details });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /**
   * Progress callback handed to the storage client.
   *
   * The update and the notifications run in one synchronous turn, so no
   * reader ever observes a half-applied count.
   */
  progress(newBytes: number): void {
    if (!(newBytes > 0)) return;

    let next = this._bytesTransferred + newBytes;
    if (this._size !== undefined && next > this._size) {
      this.logger.warn("Received more bytes than the object size, clamping", {
        size: this._size,
        reported: next,
      });
      next = this._size;
    }
    if (next === this._bytesTransferred) return;

    this._bytesTransferred = next;
    this.notify();
  }

  /**
   * Probe the object size, then stream the object to its destination.
   * Rejects with TRANSFER_FAILED when the download call fails; a failed size
   * probe is only logged.
   */
  async start(client: StorageClient): Promise<void> {
    this.transition(["ready"], "running");

    try {
      this.setSize(await client.headObject(this.bucket, this.key));
    } catch (err) {
      const error = sizeProbeFailed(this.bucket, this.key, err);
      this.logger.warn(error.message, { code: error.code, error: error.details });
    }

    this._startedAt = this.clock.now();
    this.logger.info("Download started", {
      key: this.key,
      destination: this.destination,
      size: this._size,
    });

    try {
      await client.download({
        bucket: this.bucket,
        key: this.key,
        destination: this.destination,
        options: this.options,
        onProgress: (newBytes) => this.progress(newBytes),
      });
    } catch (err) {
      throw transferFailed(this.id, this.key, err);
    }

    // Objects that produced no chunk (empty files) still get a final update.
    this.notify();
    this.settleUnverified();
  }

  // -------------------------------------------------------------------------
  // State Transitions
  // -------------------------------------------------------------------------

  markReady(): void {
    this.transition(["pending"], "ready");
  }

  markComplete(): void {
    this.transition(["running"], "complete");
  }

  markFailed(error: DownloadError): void {
    this.transition(["running"], "failed");
    this._error = error;
  }

  /** Transfer ended without a verifiable completion */
  markIncomplete(error?: DownloadError): void {
    this.transition(["running"], "incomplete");
    this._error = error;
  }

  private settleUnverified(): void {
    if (this._state !== "running" || this.isComplete) return;
    this.markIncomplete();
    this.logger.warn("Download finished but completion could not be verified", {
      size: this._size,
      bytesTransferred: this._bytesTransferred,
    });
  }

  private setSize(size: number): void {
    if (this._size !== undefined) return;
    this._size = size;
  }

  private transition(from: TaskState[], to: TaskState): void {
    if (!from.includes(this._state)) {
      throw new Error(`Task ${this.id} cannot move from ${this._state} to ${to}`);
    }
    this._state = to;
  }
}
