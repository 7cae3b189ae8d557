import { z } from "zod";
import { logger } from "../lib/logger";
import {
  describeRequestError,
  endpointUrl,
  excerpt,
  type FetchFn,
  getEndpoint,
  type Prober,
} from "./http";

// Only the field we judge health by; Grafana also reports version and commit
const GrafanaHealthSchema = z.object({
  database: z.unknown(),
});

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Grafana health checker: GET /api/health must answer 200 with
 * `{"database": "ok"}`
 */
export function createCheckGrafana(fetchFn: FetchFn = fetch): Prober {
  return async (instance, timeout) => {
    const endpoint = endpointUrl(instance.address, "/api/health");
    const startTime = Date.now();

    try {
      const response = await getEndpoint(fetchFn, endpoint, timeout);
      const latencyMs = response.latencyMs;

      if (response.status !== 200) {
        return {
          success: false,
          reason: `HTTP ${response.status} from ${endpoint}`,
          latencyMs,
        };
      }

      const json = parseJson(response.body);
      if (!json.ok) {
        return {
          success: false,
          reason: `Invalid JSON response: ${excerpt(response.body)}`,
          latencyMs,
        };
      }

      const health = GrafanaHealthSchema.safeParse(json.value);
      const database = health.success ? health.data.database : undefined;

      if (database !== "ok") {
        return {
          success: false,
          reason: `Database field is ${JSON.stringify(database) ?? "missing"}, expected "ok"`,
          latencyMs,
        };
      }

      return { success: true, reason: "Grafana is healthy", latencyMs };
    } catch (error) {
      logger.debug({ instance: instance.id, error }, "Grafana health request failed");

      return {
        success: false,
        reason: describeRequestError(error, timeout),
        latencyMs: Date.now() - startTime,
      };
    }
  };
}

export const checkGrafana = createCheckGrafana();
