/**
 * Task id → rendered status line, shared by the progress observers
 * (writers) and the tracker (reader). Last write wins.
 */
export class ProgressMap {
  private readonly entries = new Map<string, string>();

  set(taskId: string, status: string): void {
    this.entries.set(taskId, status);
  }

  get(taskId: string): string | undefined {
    return this.entries.get(taskId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Point-in-time copy in insertion order; later writes do not affect it */
  snapshot(): Array<[taskId: string, status: string]> {
    return [...this.entries];
  }
}
