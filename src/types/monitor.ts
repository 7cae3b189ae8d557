import { z } from "zod";

// Monitored service kinds
export const ServiceKindSchema = z.enum(["loki", "grafana"]);

export type ServiceKind = z.infer<typeof ServiceKindSchema>;

export const SERVICE_KINDS = ServiceKindSchema.options;

export const SERVICE_DISPLAY_NAMES: Record<ServiceKind, string> = {
  loki: "Loki",
  grafana: "Grafana",
};

/**
 * One endpoint to watch. Built once from configuration, never mutated.
 */
export interface MonitoredInstance {
  readonly id: string; // kind:address
  readonly serviceKind: ServiceKind;
  readonly address: string;
  readonly label: string;
}

export type Health = "healthy" | "unhealthy";

/**
 * Per-instance health tracking, owned by the scheduler
 */
export interface InstanceState {
  health: Health;
  consecutiveFailures: number;
  lastReason?: string;
}

/**
 * Result of a single probe
 */
export interface ProbeOutcome {
  success: boolean;
  reason?: string;
  latencyMs: number;
}

export type NotificationEventKind = "alert" | "recovery";

/**
 * Emitted on a healthy <-> unhealthy transition
 */
export interface NotificationEvent {
  kind: NotificationEventKind;
  instance: MonitoredInstance;
  previousHealth: Health;
  newHealth: Health;
  reason?: string;
  consecutiveFailures: number;
  timestamp: Date;
}
