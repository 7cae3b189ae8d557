import type { NotificationMessage } from "../alerting/types";
import type { NotificationDispatcher } from "../alerting/dispatcher";
import type { Prober } from "../checkers/http";
import type { Sleep } from "../lib/sleep";
import type { MonitoredInstance } from "../types/monitor";

/**
 * Daemon lifecycle phases
 */
export type SchedulerPhase = "starting" | "running" | "shutting_down" | "stopped";

export interface SchedulerOptions {
  instances: MonitoredInstance[];
  failureThreshold: number;
  checkIntervalSeconds: number;
  requestTimeoutSeconds: number;
  prober: Prober;
  dispatcher: NotificationDispatcher;
  // Sent once on startup, best-effort
  startupMessage?: NotificationMessage;
  sleep?: Sleep;
  sliceMs?: number;
}
