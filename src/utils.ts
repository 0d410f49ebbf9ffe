import type { Logger } from "./logger.js";
import type { CallbackOptions } from "./types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a base-10 integer the way the radio writes them: optional sign,
 * digits only, surrounding whitespace ignored. Returns null otherwise.
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

export interface Reporter {
  status(message: string): void;
  progress(value: number, maximum: number): void;
}

/**
 * Wrap caller supplied callbacks so that a throwing callback is logged
 * instead of aborting the operation that reported to it.
 */
export function createReporter(
  callbacks: CallbackOptions,
  log: Logger
): Reporter {
  return {
    status(message: string) {
      log.info(message);
      if (!callbacks.onStatus) return;
      try {
        callbacks.onStatus(message);
      } catch (err) {
        log.error(`Error in status callback: ${(err as Error).message}`);
      }
    },
    progress(value: number, maximum: number) {
      if (!callbacks.onProgress) return;
      try {
        callbacks.onProgress(value, maximum);
      } catch (err) {
        log.error(`Error in progress callback: ${(err as Error).message}`);
      }
    },
  };
}
