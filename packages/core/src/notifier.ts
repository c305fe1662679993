import type { Severity } from "./enums.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export interface Notifier {
  notify(severity: Severity, message: string): void | Promise<void>;
}

/**
 * Delivers through the notifier without awaiting it. Delivery failures, sync or
 * async, end up in the log and never reach the caller.
 */
export function safeNotify(notifier: Notifier | undefined, log: Logger, severity: Severity, message: string): void {
  if (!notifier) return;
  try {
    const pending = notifier.notify(severity, message);
    if (pending instanceof Promise) {
      void pending.catch((error: unknown) => {
        log.warn({ err: errorMessage(error), severity }, "notification delivery failed");
      });
    }
  } catch (error) {
    log.warn({ err: errorMessage(error), severity }, "notification delivery failed");
  }
}

/** Writes notifications to the log; used when no chat transport is configured. */
export class LogNotifier implements Notifier {
  constructor(private readonly log: Logger) {}

  notify(severity: Severity, message: string): void {
    if (severity === "critical") {
      this.log.error({ severity }, message);
      return;
    }
    if (severity === "warning") {
      this.log.warn({ severity }, message);
      return;
    }
    this.log.info({ severity }, message);
  }
}
