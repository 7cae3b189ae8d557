#!/usr/bin/env node
/**
 * healthwatch main entry point
 *
 * Watches Loki and Grafana instances and posts Discord alerts when an
 * instance goes down or comes back.
 */

import "dotenv/config";
import { hostname } from "node:os";
import { createDiscordNotifier, createNotificationDispatcher, formatStartup } from "./alerting";
import { probeInstance } from "./checkers";
import { APP_NAME, APP_VERSION, type Config, ConfigError, loadConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { enableDefaultMetrics } from "./lib/prometheus";
import { buildInstances } from "./monitor/instances";
import { createScheduler } from "./scheduler";
import { createMetricsServer, type MetricsServer } from "./server/metrics-server";

function readConfig(): Config | undefined {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, "Configuration errors:");
      for (const issue of error.issues) {
        logger.fatal(`  - ${issue}`);
      }
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) {
    return 1;
  }

  if (config.logLevel) {
    logger.level = config.logLevel;
  }

  logger.info(`${APP_NAME} v${APP_VERSION}`);

  const controller = new AbortController();
  const requestShutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info({ signal }, "Received signal; initiating graceful shutdown");
    controller.abort();
  };
  process.on("SIGINT", requestShutdown);
  process.on("SIGTERM", requestShutdown);

  let metricsServer: MetricsServer | null = null;
  if (config.metricsPort) {
    enableDefaultMetrics();
    metricsServer = createMetricsServer({ port: config.metricsPort, host: "0.0.0.0" });
    await metricsServer.start();
  }

  const host = hostname();
  const dispatcher = createNotificationDispatcher({
    notifier: createDiscordNotifier({ webhookUrl: config.discordWebhookUrl }),
    signal: controller.signal,
    host,
  });

  const scheduler = createScheduler({
    instances: buildInstances(config.urls),
    failureThreshold: config.failureThreshold,
    checkIntervalSeconds: config.checkIntervalSeconds,
    requestTimeoutSeconds: config.requestTimeoutSeconds,
    prober: probeInstance,
    dispatcher,
    startupMessage: formatStartup(config, host),
  });

  await scheduler.run(controller.signal);

  if (metricsServer) {
    await metricsServer.stop();
  }

  process.off("SIGINT", requestShutdown);
  process.off("SIGTERM", requestShutdown);
  logger.info(`${APP_NAME} shutting down. Goodbye.`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, "Unhandled error");
    process.exit(1);
  });
