/**
 * Mock network operations for testing
 */

import { vi } from "vitest";
import type { FetchFn } from "../../checkers/http";

/**
 * Mock fetch responses
 */
export interface MockFetchResponse {
  status: number;
  headers?: Record<string, string>;
  body: string;
}

export type MockFetchStep = MockFetchResponse | { error: Error };

/**
 * Creates a mock fetch returning the given steps in order; the last step
 * repeats once the list is exhausted
 */
export function createMockFetch(steps: MockFetchStep | MockFetchStep[]) {
  const responses = Array.isArray(steps) ? steps : [steps];
  let callCount = 0;

  return vi.fn<FetchFn>(async () => {
    const step = responses[Math.min(callCount, responses.length - 1)];
    callCount++;

    if (!step) {
      throw new Error("No mock response configured");
    }
    if ("error" in step) {
      throw step.error;
    }

    // Null-body statuses cannot carry a body
    const body = step.status === 204 ? null : step.body;
    return new Response(body, { status: step.status, headers: step.headers });
  });
}

/**
 * Creates a fetch that never answers until its request signal aborts
 */
export function createHangingFetch() {
  return vi.fn<FetchFn>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener("abort", () => {
          const error = new Error("This operation was aborted");
          error.name = "AbortError";
          reject(error);
        });
      }),
  );
}

/**
 * Node's fetch wraps socket failures in a TypeError with the system error as cause
 */
export function createConnectionError(code: string, message: string): Error {
  const cause = Object.assign(new Error(message), { code });
  return new TypeError("fetch failed", { cause });
}

export function successResponse(body: string, status = 200): MockFetchResponse {
  return { status, body };
}

export function errorResponse(status: number, body = ""): MockFetchResponse {
  return { status, body };
}
