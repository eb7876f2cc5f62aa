// src/shutdown.ts
import type { Logger } from "./logger.js";

export type ShutdownHandle = {
  signal: AbortSignal;
  /** Abort programmatically, e.g. from a test or an embedding process. */
  trigger: (reason?: string) => void;
  dispose: () => void;
};

/**
 * AbortSignal that fires on the first termination request. The monitor
 * checks it at the top of each cycle, before each copy, and while sleeping.
 */
export function createShutdownSignal({
  signals = ["SIGINT", "SIGTERM"],
  logger,
}: {
  signals?: NodeJS.Signals[];
  logger?: Logger;
} = {}): ShutdownHandle {
  const controller = new AbortController();

  const trigger = (reason = "shutdown requested") => {
    if (controller.signal.aborted) return;
    logger?.info("shutdown requested; finishing current step", { reason });
    controller.abort(reason);
  };

  const onSignal = (sig: NodeJS.Signals) => trigger(sig);
  for (const sig of signals) {
    process.once(sig, onSignal);
  }

  const dispose = () => {
    for (const sig of signals) {
      process.removeListener(sig, onSignal);
    }
  };

  return { signal: controller.signal, trigger, dispose };
}
