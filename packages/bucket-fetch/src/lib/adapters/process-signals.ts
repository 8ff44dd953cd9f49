import type { SignalHandler } from "../ports/signal-handler.js";
import { errorMessage, type Logger } from "../logger.js";

/**
 * Create a signal handler for process shutdown signals.
 * The first signal runs every callback and leaves exit code 130 for when the
 * process winds down; a second signal exits at once.
 */
export function createProcessSignalHandler(logger: Logger): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async (signal: NodeJS.Signals) => {
    if (isHandling) {
      logger.warn("Second signal received, exiting immediately", { signal });
      process.exit(130);
    }
    isHandling = true;
    logger.info("Received signal", { signal });
    const results = await Promise.allSettled(handlers.map((h) => h(signal)));
    for (const result of results) {
      if (result.status === "rejected") {
        logger.error("Shutdown handler failed", { error: errorMessage(result.reason) });
      }
    }
    process.exitCode = 130;
  };

  const listener = (signal: NodeJS.Signals) => {
    void handleSignal(signal);
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", listener);
        process.on("SIGINT", listener);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", listener);
      process.off("SIGINT", listener);
    },
  };
}
