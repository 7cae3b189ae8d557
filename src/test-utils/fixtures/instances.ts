/**
 * Monitored instance fixtures
 */

import { createInstance } from "../../monitor/instances";
import type { InstanceState, MonitoredInstance, ProbeOutcome } from "../../types/monitor";

export function createLokiInstance(address = "http://loki.test:3100", total = 1): MonitoredInstance {
  return createInstance("loki", address, total);
}

export function createGrafanaInstance(
  address = "http://grafana.test:3000",
  total = 1,
): MonitoredInstance {
  return createInstance("grafana", address, total);
}

export function createInstanceStateFixture(overrides?: Partial<InstanceState>): InstanceState {
  return {
    health: "healthy",
    consecutiveFailures: 0,
    ...overrides,
  };
}

export function successOutcome(latencyMs = 12): ProbeOutcome {
  return { success: true, reason: "ok", latencyMs };
}

export function failureOutcome(reason = "HTTP 503 from http://loki.test:3100/ready", latencyMs = 12): ProbeOutcome {
  return { success: false, reason, latencyMs };
}
