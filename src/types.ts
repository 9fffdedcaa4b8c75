// Core types for the alert-to-status engine

// Health of a single monitored target, derived from its active alerts
export type TargetHealth = "HEALTHY" | "DOWN";

// Health of a visible service, aggregated over its member targets
export type AggregateHealth = "HEALTHY" | "PARTIAL" | "DOWN";

// One alert line from a notification batch, after normalization
export interface AlertEvent {
  alertName: string;
  targetInstance: string; // e.g. host:port
  firing: boolean; // false means resolved
  serviceNames: string[]; // comma-split visible service names, in label order
  serviceLabel: string; // raw status_page_component label, part of the target display key
  critical: boolean;
}

// Per-target record, owned by TargetStateStore
export interface TargetState {
  targetInstance: string;
  componentName: string; // "<instance> | <service label>"
  serviceNames: Set<string>;
  activeAlerts: Set<string>;
  critical: boolean;
  health: TargetHealth;
  backendComponentId?: number;
  version: number; // bumped on every effective mutation
  publishedVersion: number; // last version confirmed by the backend
  publishedHealth?: TargetHealth; // component status confirmed by the backend
  publishing: boolean;
}

// Immutable copy of a target, safe to use outside the target lock
export interface TargetSnapshot {
  targetInstance: string;
  componentName: string;
  serviceNames: string[];
  activeAlerts: string[];
  critical: boolean;
  health: TargetHealth;
  version: number;
}

// Result of applying one AlertEvent to its target
export interface TargetApplyResult {
  health: TargetHealth;
  changed: boolean; // health changed
  criticalChanged: boolean;
  servicesAdded: string[]; // services this target was not yet a member of
  snapshot: TargetSnapshot;
}

// A target snapshot handed to the publisher, with what the backend last confirmed
export interface TargetPublication {
  snapshot: TargetSnapshot;
  previousHealth?: TargetHealth;
  backendComponentId?: number;
}

// Per-service record, owned by ServiceAggregator
export interface ServiceState {
  name: string;
  memberTargets: Set<string>;
  aggregateHealth: AggregateHealth;
  publishedHealth?: AggregateHealth; // component status confirmed by the backend
  openIncidentId?: number; // set only from a confirmed createIncident
  backendComponentId?: number;
  reconciling: boolean;
}

export interface ServiceSnapshot {
  name: string;
  aggregateHealth: AggregateHealth;
  publishedHealth?: AggregateHealth;
  openIncidentId?: number;
  backendComponentId?: number;
}

export interface AggregateTransition {
  service: string;
  previous: AggregateHealth;
  next: AggregateHealth;
}

// Outcome of one webhook batch
export interface ProcessingSummary {
  received: number;
  processed: number;
  dropped: number;
  malformed: number;
}

// Settings loaded from the JSON configuration file
export interface GroupConfiguration {
  status_page_group: string;
  status_page_components: string[];
}

export interface BridgeSettings {
  new_incident_name: string; // "%s" is replaced with the service name
  new_incident_message: string;
  resolved_incident_message: string;
  cachet_per_page_param: number;
  groups_configuration: GroupConfiguration[];
}
