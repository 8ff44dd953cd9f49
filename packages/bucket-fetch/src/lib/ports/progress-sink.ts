/**
 * Output target for the periodic progress view.
 * Allows testing the tracker without a terminal.
 */
export interface ProgressSink {
  /** Replace the current view with these lines */
  render(lines: string[]): void;
  /** Leave the final view in place and release the output */
  done(): void;
}
