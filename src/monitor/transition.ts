import type {
  InstanceState,
  MonitoredInstance,
  NotificationEvent,
  ProbeOutcome,
} from "../types/monitor";

export interface Evaluation {
  state: InstanceState;
  event?: NotificationEvent;
}

/**
 * Fold one probe outcome into an instance's state.
 *
 * Pure: the input state is left untouched and a new state is returned along
 * with the event to notify, if the outcome crossed a transition:
 *
 * - success while unhealthy -> healthy, recovery event
 * - failure while healthy, reaching `threshold` consecutive failures
 *   -> unhealthy, alert event
 *
 * Failures below the threshold, or while already unhealthy, only move the
 * counter. That is what keeps blips quiet and outages from re-alerting.
 */
export function evaluate(
  instance: MonitoredInstance,
  state: InstanceState,
  outcome: ProbeOutcome,
  threshold: number,
  now: Date = new Date(),
): Evaluation {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new RangeError(`Failure threshold must be an integer >= 1, got ${threshold}`);
  }

  if (outcome.success) {
    if (state.health === "unhealthy") {
      return {
        state: { health: "healthy", consecutiveFailures: 0 },
        event: {
          kind: "recovery",
          instance,
          previousHealth: "unhealthy",
          newHealth: "healthy",
          consecutiveFailures: 0,
          timestamp: now,
        },
      };
    }
    return { state: { health: "healthy", consecutiveFailures: 0 } };
  }

  const consecutiveFailures = state.consecutiveFailures + 1;
  const reason = outcome.reason ?? "Unknown failure";

  if (state.health === "healthy" && consecutiveFailures >= threshold) {
    return {
      state: { health: "unhealthy", consecutiveFailures, lastReason: reason },
      event: {
        kind: "alert",
        instance,
        previousHealth: "healthy",
        newHealth: "unhealthy",
        reason,
        consecutiveFailures,
        timestamp: now,
      },
    };
  }

  return {
    state: { health: state.health, consecutiveFailures, lastReason: reason },
  };
}
