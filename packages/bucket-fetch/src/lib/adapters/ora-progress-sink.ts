import ora, { type Ora } from "ora";
import type { ProgressSink } from "../ports/progress-sink.js";

const HEADER = "Progress:";

/**
 * Progress view drawn in place by an ora spinner.
 * Each render replaces the spinner text, so the terminal is redrawn rather
 * than scrolled.
 */
export function createOraProgressSink(spinner: Ora = ora({ discardStdin: false })): ProgressSink {
  let text = HEADER;

  return {
    render(lines: string[]): void {
      text = [HEADER, ...lines].join("\n");
      if (spinner.isSpinning) {
        spinner.text = text;
      } else {
        spinner.start(text);
      }
    },

    done(): void {
      spinner.stopAndPersist({ symbol: "•", text });
    },
  };
}
