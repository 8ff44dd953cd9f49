import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ProgressTracker } from "./progress-tracker.js";
import { ProgressMap } from "./progress-map.js";
import type { ProgressSink } from "./ports/progress-sink.js";
import { createNoopLogger, type Logger } from "./logger.js";

function recordingSink(): ProgressSink & { frames: string[][]; doneCalls: number } {
  const sink = {
    frames: [] as string[][],
    doneCalls: 0,
    render(lines: string[]) {
      sink.frames.push(lines);
    },
    done() {
      sink.doneCalls++;
    },
  };
  return sink;
}

describe("ProgressTracker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders immediately and then once per interval", async () => {
    const progress = new ProgressMap();
    const sink = recordingSink();
    const tracker = new ProgressTracker({
      progress,
      sink,
      logger: createNoopLogger(),
      intervalMs: 2000,
    });

    progress.set("a", "transferred 10%  1 MB/s");
    tracker.start();
    expect(sink.frames).toEqual([["a: transferred 10%  1 MB/s"]]);

    progress.set("a", "transferred 50%  1 MB/s");
    progress.set("b", "transferred 0 bytes  0 MB/s");
    await vi.advanceTimersByTimeAsync(1999);
    expect(sink.frames).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(sink.frames[1]).toEqual([
      "a: transferred 50%  1 MB/s",
      "b: transferred 0 bytes  0 MB/s",
    ]);

    await vi.advanceTimersByTimeAsync(4000);
    expect(sink.frames).toHaveLength(4);

    await tracker.stop();
  });

  it("stop renders the final state, releases the sink and cancels the timer", async () => {
    const progress = new ProgressMap();
    const sink = recordingSink();
    const tracker = new ProgressTracker({ progress, sink, logger: createNoopLogger() });

    tracker.start();
    progress.set("a", "transferred 100%  2 MB/s");
    await tracker.stop();

    expect(sink.frames.at(-1)).toEqual(["a: transferred 100%  2 MB/s"]);
    expect(sink.doneCalls).toBe(1);
    expect(vi.getTimerCount()).toBe(0);
    expect(tracker.isRunning).toBe(false);
  });

  it("tolerates stop before start and repeated stop", async () => {
    const sink = recordingSink();
    const tracker = new ProgressTracker({
      progress: new ProgressMap(),
      sink,
      logger: createNoopLogger(),
    });

    await tracker.stop();
    tracker.start();
    await tracker.stop();
    await tracker.stop();

    expect(sink.doneCalls).toBe(1);
  });

  it("logs and keeps ticking when the sink throws", async () => {
    const logger: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn().mockReturnThis(),
    };
    let calls = 0;
    const tracker = new ProgressTracker({
      progress: new ProgressMap(),
      sink: {
        render: () => {
          calls++;
          throw new Error("terminal gone");
        },
        done: () => {},
      },
      logger,
      intervalMs: 100,
    });

    tracker.start();
    await vi.advanceTimersByTimeAsync(100);

    expect(calls).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith("Progress render failed", { error: "terminal gone" });
    await tracker.stop();
  });
});
