import { setTimeout as delay } from "node:timers/promises";

/**
 * Cancellable wait. Rejects with an AbortError when the signal fires.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
