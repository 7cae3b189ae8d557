import {
  type InstanceState,
  type MonitoredInstance,
  SERVICE_DISPLAY_NAMES,
  SERVICE_KINDS,
  type ServiceKind,
} from "../types/monitor";

/**
 * Display label for an instance.
 * A kind watched at a single address is labelled by kind alone ("Loki");
 * with several addresses the host is appended ("Loki (host:3100)").
 */
export function instanceLabel(kind: ServiceKind, address: string, total: number): string {
  const name = SERVICE_DISPLAY_NAMES[kind];
  if (total === 1) {
    return name;
  }
  return `${name} (${new URL(address).host})`;
}

export function createInstance(kind: ServiceKind, address: string, total = 1): MonitoredInstance {
  return Object.freeze({
    id: `${kind}:${address}`,
    serviceKind: kind,
    address,
    label: instanceLabel(kind, address, total),
  });
}

/**
 * Build the monitored instance list, grouped by kind in a stable order
 */
export function buildInstances(urls: Record<ServiceKind, string[]>): MonitoredInstance[] {
  return SERVICE_KINDS.flatMap((kind) =>
    urls[kind].map((address) => createInstance(kind, address, urls[kind].length)),
  );
}

/**
 * Fresh state for an instance. Optimistically healthy: nothing alerts
 * until the failure threshold has actually been reached.
 */
export function createInstanceState(): InstanceState {
  return {
    health: "healthy",
    consecutiveFailures: 0,
  };
}
