import type { ServiceKind } from "../types/monitor";
import { checkGrafana } from "./grafana";
import type { Prober } from "./http";
import { checkLoki } from "./loki";

export type ProberRegistry = Record<ServiceKind, Prober>;

export const defaultProbers: ProberRegistry = {
  loki: checkLoki,
  grafana: checkGrafana,
};

/**
 * Build a prober that dispatches on the instance's service kind.
 * Unexpected throws from a checker propagate so the scheduler can skip
 * the instance for the cycle instead of counting a failure.
 */
export function createProber(probers: ProberRegistry = defaultProbers): Prober {
  return async (instance, timeout) => {
    const kind = instance.serviceKind;

    switch (kind) {
      case "loki":
        return await probers.loki(instance, timeout);

      case "grafana":
        return await probers.grafana(instance, timeout);

      default: {
        const exhaustive: never = kind;
        return {
          success: false,
          reason: `Unknown service kind: ${String(exhaustive)}`,
          latencyMs: 0,
        };
      }
    }
  };
}

export const probeInstance = createProber();

export type { FetchFn, Prober } from "./http";
export { createCheckGrafana } from "./grafana";
export { createCheckLoki } from "./loki";
