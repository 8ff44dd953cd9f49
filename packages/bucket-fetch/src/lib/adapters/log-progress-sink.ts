import type { Logger } from "../logger.js";
import type { ProgressSink } from "../ports/progress-sink.js";

/**
 * Progress view for non-interactive output: one log entry per changed frame.
 */
export function createLogProgressSink(logger: Logger): ProgressSink {
  let last = "";

  return {
    render(lines: string[]): void {
      const frame = lines.join("\n");
      if (lines.length === 0 || frame === last) return;
      last = frame;
      logger.info("Progress", { tasks: lines });
    },

    done(): void {},
  };
}

/**
 * Progress view that draws nothing (--quiet).
 */
export const silentProgressSink: ProgressSink = {
  render: () => {},
  done: () => {},
};
