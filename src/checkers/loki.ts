import { logger } from "../lib/logger";
import {
  describeRequestError,
  endpointUrl,
  excerpt,
  type FetchFn,
  getEndpoint,
  type Prober,
} from "./http";

/**
 * Loki readiness checker: GET /ready must answer 200 with "ready" in the body
 */
export function createCheckLoki(fetchFn: FetchFn = fetch): Prober {
  return async (instance, timeout) => {
    const endpoint = endpointUrl(instance.address, "/ready");
    const startTime = Date.now();

    try {
      const response = await getEndpoint(fetchFn, endpoint, timeout);

      if (response.status !== 200) {
        return {
          success: false,
          reason: `HTTP ${response.status} from ${endpoint}`,
          latencyMs: response.latencyMs,
        };
      }

      if (!response.body.toLowerCase().includes("ready")) {
        return {
          success: false,
          reason: `Response body does not contain 'ready': ${excerpt(response.body)}`,
          latencyMs: response.latencyMs,
        };
      }

      return { success: true, reason: "Loki is ready", latencyMs: response.latencyMs };
    } catch (error) {
      logger.debug({ instance: instance.id, error }, "Loki readiness request failed");

      return {
        success: false,
        reason: describeRequestError(error, timeout),
        latencyMs: Date.now() - startTime,
      };
    }
  };
}

export const checkLoki = createCheckLoki();
