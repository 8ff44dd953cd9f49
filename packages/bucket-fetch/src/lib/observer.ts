import type { Clock } from "./ports/clock.js";
import type { ProgressMap } from "./progress-map.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * What listeners may read from a transfer.
 */
export interface TransferView {
  readonly id: string;
  /** Remote size in bytes, undefined until the size probe succeeds */
  readonly size: number | undefined;
  readonly bytesTransferred: number;
  /** Epoch milliseconds when execution began */
  readonly startedAt: number | undefined;
}

export interface Listener<T extends TransferView = TransferView> {
  update(subject: T): void;
}

export interface Notifier<T extends TransferView = TransferView> {
  /** No-op when the listener is already attached */
  attach(listener: Listener<T>): void;
  /** No-op when the listener is not attached */
  detach(listener: Listener<T>): void;
  notify(): void;
}

// ---------------------------------------------------------------------------
// Status Formatting
// ---------------------------------------------------------------------------

const BYTES_PER_MB = 1_000_000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Percentage complete, or undefined when the size is unknown or zero.
 */
export function computePercentage(
  bytesTransferred: number,
  size: number | undefined
): number | undefined {
  if (size === undefined || size === 0) return undefined;
  return round2((bytesTransferred / size) * 100);
}

/**
 * Average throughput in MB/s since `startedAt`.
 */
export function computeRateMBps(
  bytesTransferred: number,
  startedAt: number | undefined,
  now: number
): number {
  if (startedAt === undefined) return 0;
  const elapsedSeconds = (now - startedAt) / 1000;
  if (elapsedSeconds <= 0) return 0;
  return round2(bytesTransferred / elapsedSeconds / BYTES_PER_MB);
}

export function formatStatus(subject: TransferView, now: number): string {
  const rate = computeRateMBps(subject.bytesTransferred, subject.startedAt, now);
  const percentage = computePercentage(subject.bytesTransferred, subject.size);

  if (percentage === undefined) {
    return `transferred ${subject.bytesTransferred} bytes  ${rate} MB/s`;
  }
  return `transferred ${percentage}%  ${rate} MB/s`;
}

// ---------------------------------------------------------------------------
// Listeners
// ---------------------------------------------------------------------------

/**
 * Fires its callback once, the first time the transfer's byte count equals
 * its known size. Later notifications at or past that point are ignored.
 */
export class CompletionObserver<T extends TransferView = TransferView>
  implements Listener<T>
{
  private fired = false;

  constructor(private readonly onComplete: (subject: T) => void) {}

  get hasFired(): boolean {
    return this.fired;
  }

  update(subject: T): void {
    if (this.fired) return;
    if (subject.size === undefined || subject.bytesTransferred !== subject.size) {
      return;
    }
    this.fired = true;
    this.onComplete(subject);
  }
}

/**
 * Rewrites the transfer's status line in the progress map on every update.
 */
export class ProgressObserver<T extends TransferView = TransferView>
  implements Listener<T>
{
  constructor(
    private readonly progress: ProgressMap,
    private readonly clock: Clock
  ) {}

  update(subject: T): void {
    this.progress.set(subject.id, formatStatus(subject, this.clock.now()));
  }
}
