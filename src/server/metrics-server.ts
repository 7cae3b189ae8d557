/**
 * Minimal HTTP server for Prometheus metrics scraping
 *
 * Serves /metrics plus a liveness endpoint; only started when METRICS_PORT
 * is configured.
 */

import { createServer } from "node:http";
import { logger } from "../lib/logger";
import { getMetrics } from "../lib/prometheus";

export interface MetricsRequest {
  method?: string;
  url?: string;
}

export interface MetricsResponse {
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(body?: string): unknown;
}

export interface MetricsServerConfig {
  port: number;
  host: string;
}

/**
 * Route a request: GET /metrics, /health(z), everything else 404
 */
export async function handleMetricsRequest(
  req: MetricsRequest,
  res: MetricsResponse,
  metrics: () => Promise<string> = getMetrics,
): Promise<void> {
  if (req.method === "GET" && req.url === "/metrics") {
    try {
      const body = await metrics();
      res.writeHead(200, {
        "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
      });
      res.end(body);
    } catch (error) {
      logger.error({ error }, "Failed to generate metrics");
      res.writeHead(500);
      res.end("Internal Server Error\n");
    }
  } else if (req.url === "/health" || req.url === "/healthz") {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("OK\n");
  } else {
    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not Found\n");
  }
}

export function createMetricsServer(config: MetricsServerConfig) {
  const server = createServer((req, res) => {
    handleMetricsRequest(req, res).catch((error: unknown) => {
      logger.error({ error }, "Metrics request failed");
    });
  });

  let listening = false;

  return {
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          logger.info({ port: config.port, host: config.host }, "Metrics server started");
          listening = true;
          resolve();
        });
      });
    },

    stop(): Promise<void> {
      return new Promise((resolve) => {
        if (!listening) {
          resolve();
          return;
        }

        server.close(() => {
          listening = false;
          logger.info("Metrics server stopped");
          resolve();
        });
      });
    },
  };
}

export type MetricsServer = ReturnType<typeof createMetricsServer>;
