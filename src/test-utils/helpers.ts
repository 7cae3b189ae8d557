/**
 * Test helper utilities
 */

import type { Sleep } from "../lib/sleep";

/**
 * Same shape as the error Node's timers reject with on abort
 */
export function createAbortError(message = "The operation was aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export interface RecordingSleep {
  sleep: Sleep;
  delays: number[];
}

/**
 * Sleep that resolves immediately and records each requested delay.
 * Honors the abort signal like the real one. `onSleep` runs before each
 * wait resolves, e.g. to abort a controller after N slices.
 */
export function createRecordingSleep(onSleep?: (delayMs: number, count: number) => void): RecordingSleep {
  const delays: number[] = [];

  const sleep: Sleep = async (ms, signal) => {
    if (signal?.aborted) {
      throw createAbortError();
    }
    delays.push(ms);
    onSleep?.(ms, delays.length);
    if (signal?.aborted) {
      throw createAbortError();
    }
  };

  return { sleep, delays };
}
