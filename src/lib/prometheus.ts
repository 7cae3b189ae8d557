/**
 * Prometheus metrics
 *
 * Exposed on /metrics when METRICS_PORT is set. Nothing is stored beyond
 * the current process; this is a scrape surface, not a history.
 */

import { Counter, collectDefaultMetrics, Gauge, Registry } from "prom-client";
import type {
  InstanceState,
  MonitoredInstance,
  NotificationEvent,
  ProbeOutcome,
} from "../types/monitor";

const registry = new Registry();

let defaultMetricsEnabled = false;

/**
 * Collect Node.js process metrics (CPU, memory, event loop) as well
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  collectDefaultMetrics({ register: registry });
  defaultMetricsEnabled = true;
}

/**
 * Instance health (0 = unhealthy, 1 = healthy)
 */
export const instanceHealth = new Gauge({
  name: "healthwatch_instance_health",
  help: "Classified health of a monitored instance (0=unhealthy, 1=healthy)",
  labelNames: ["service", "instance"] as const,
  registers: [registry],
});

export const consecutiveFailures = new Gauge({
  name: "healthwatch_instance_consecutive_failures",
  help: "Consecutive failed probes for a monitored instance",
  labelNames: ["service", "instance"] as const,
  registers: [registry],
});

export const probeLatency = new Gauge({
  name: "healthwatch_probe_latency_ms",
  help: "Latency of the last probe in milliseconds",
  labelNames: ["service", "instance"] as const,
  registers: [registry],
});

export const probesTotal = new Counter({
  name: "healthwatch_probes_total",
  help: "Total number of probes performed",
  labelNames: ["service", "instance", "result"] as const,
  registers: [registry],
});

export const transitionsTotal = new Counter({
  name: "healthwatch_transitions_total",
  help: "Health transitions (healthy to unhealthy and back)",
  labelNames: ["service", "instance", "to_state"] as const,
  registers: [registry],
});

export const notificationsTotal = new Counter({
  name: "healthwatch_notifications_total",
  help: "Notification dispatches by outcome",
  labelNames: ["kind", "result"] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return await registry.metrics();
}

export function getRegistry(): Registry {
  return registry;
}

/**
 * Record a probe and the state it produced
 */
export function recordProbe(
  instance: MonitoredInstance,
  outcome: ProbeOutcome,
  state: InstanceState,
): void {
  const labels = { service: instance.serviceKind, instance: instance.address };

  instanceHealth.set(labels, state.health === "healthy" ? 1 : 0);
  consecutiveFailures.set(labels, state.consecutiveFailures);
  probeLatency.set(labels, outcome.latencyMs);
  probesTotal.inc({ ...labels, result: outcome.success ? "success" : "failure" });
}

export function recordTransition(event: NotificationEvent): void {
  transitionsTotal.inc({
    service: event.instance.serviceKind,
    instance: event.instance.address,
    to_state: event.newHealth,
  });
}

export function recordNotification(
  kind: NotificationEvent["kind"] | "startup",
  result: "delivered" | "failed",
): void {
  notificationsTotal.inc({ kind, result });
}
