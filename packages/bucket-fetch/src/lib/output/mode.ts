/**
 * Output mode detection for choosing how download progress is shown.
 */

export type OutputMode = "tui" | "static" | "json" | "quiet";

export interface OutputFlags {
  json?: boolean;
  quiet?: boolean;
}

/**
 * Detect the appropriate output mode based on flags and environment.
 *
 * - `tui`: interactive terminal, progress redrawn in place
 * - `static`: plain log lines (CI, pipes, dumb terminals)
 * - `json`: structured log lines for scripting
 * - `quiet`: no progress at all
 */
export function getOutputMode(
  flags: OutputFlags,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): OutputMode {
  if (flags.json) {
    return "json";
  }

  if (flags.quiet) {
    return "quiet";
  }

  // CI environment
  if (env.CI || env.BUCKET_FETCH_NON_INTERACTIVE) {
    return "static";
  }

  // Not a TTY (piped output)
  if (!isTTY) {
    return "static";
  }

  // Dumb terminal
  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
