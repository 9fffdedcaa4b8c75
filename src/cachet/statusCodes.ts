import { Config } from "../config";
import { AggregateHealth, TargetHealth } from "../types";

export type IncidentStatus = "INVESTIGATING" | "FIXED";

// Logical health -> Cachet component status code
export function toCachetStatus(health: AggregateHealth | TargetHealth): number {
  const config = Config.Instance;
  switch (health) {
    case "HEALTHY":
      return config.statusHealthy;
    case "PARTIAL":
      return config.statusPartial;
    case "DOWN":
      return config.statusDown;
  }
}

// Cachet component status code -> logical health. Codes other than the
// healthy and down ones (performance issues, partial outage) read as PARTIAL.
export function fromCachetStatus(code: number): AggregateHealth {
  const config = Config.Instance;
  if (code === config.statusHealthy || code === 0) return "HEALTHY";
  if (code === config.statusDown) return "DOWN";
  return "PARTIAL";
}

export function toCachetIncidentStatus(status: IncidentStatus): number {
  const config = Config.Instance;
  return status === "INVESTIGATING" ? config.incidentInvestigating : config.incidentFixed;
}
