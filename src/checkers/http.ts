import type { MonitoredInstance, ProbeOutcome } from "../types/monitor";

export type FetchFn = typeof fetch;

/**
 * A prober performs one health check against an instance, bounded by
 * `timeout` seconds. Expected failures come back as outcomes, not throws.
 */
export type Prober = (instance: MonitoredInstance, timeout: number) => Promise<ProbeOutcome>;

export interface EndpointResponse {
  status: number;
  body: string;
  latencyMs: number;
}

// Response excerpts quoted in failure reasons
export const EXCERPT_LENGTH = 120;

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

export function excerpt(text: string): string {
  return text.slice(0, EXCERPT_LENGTH);
}

export function endpointUrl(address: string, path: string): string {
  return address.replace(/\/+$/, "") + path;
}

/**
 * GET an endpoint and read its body, aborting once `timeout` seconds pass
 */
export async function getEndpoint(
  fetchFn: FetchFn,
  endpoint: string,
  timeout: number,
): Promise<EndpointResponse> {
  const startTime = Date.now();
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeout * 1000);

  try {
    const response = await fetchFn(endpoint, {
      method: "GET",
      headers: { "User-Agent": "healthwatch" },
      signal: controller.signal,
    });
    const body = await response.text();

    return {
      status: response.status,
      body,
      latencyMs: Date.now() - startTime,
    };
  } finally {
    clearTimeout(timeoutHandle);
  }
}

function connectionErrorMessage(error: Error): string | undefined {
  const cause = error.cause;
  if (cause instanceof Error && "code" in cause && CONNECTION_ERROR_CODES.has(String(cause.code))) {
    return cause.message;
  }
  if ("code" in error && CONNECTION_ERROR_CODES.has(String(error.code))) {
    return error.message;
  }
  return undefined;
}

/**
 * Turn a thrown request error into a failure reason
 */
export function describeRequestError(error: unknown, timeout: number): string {
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return `Request timed out after ${timeout}s`;
    }

    const connectionMessage = connectionErrorMessage(error);
    if (connectionMessage) {
      return `Connection error: ${connectionMessage}`;
    }

    return `Request failed: ${error.message}`;
  }

  return `Request failed: ${String(error)}`;
}
