import chalk from "chalk";
import { isDownloadError, type DownloadError } from "./types.js";
import { unknownError } from "./catalog.js";

export type RenderMode = "text" | "json";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Build the lines for the human-readable rendering.
 */
export function formatError(error: DownloadError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push(`  ${chalk.dim(error.details)}`);
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  output.push("");
  return output;
}

/**
 * Build the JSON rendering, dropping absent fields.
 */
export function formatErrorJson(error: DownloadError): string {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  return JSON.stringify(cleaned, null, 2);
}

/**
 * Render any thrown value to stderr.
 */
export function renderError(error: unknown, mode: RenderMode = "text"): void {
  const downloadError = isDownloadError(error) ? error : unknownError(error);

  if (mode === "json") {
    console.error(formatErrorJson(downloadError));
    return;
  }

  for (const line of formatError(downloadError)) {
    console.error(line);
  }
}
