import { AggregateHealth, TargetHealth } from "../types";
import { IncidentStatus } from "./statusCodes";

export interface CachetComponent {
  id: number;
  name: string;
  status: AggregateHealth; // already mapped from the numeric code
  statusCode: number;
  enabled: boolean;
  description: string;
  meta: Record<string, unknown> | null;
  groupId: number | null;
}

export interface CachetComponentGroup {
  id: number;
  name: string;
}

export interface CachetIncident {
  id: number;
  name: string;
  statusCode: number;
  componentId: number | null;
}

export interface ComponentInput {
  name: string;
  status: AggregateHealth | TargetHealth;
  enabled: boolean;
  description?: string;
  meta?: Record<string, unknown>;
  groupId?: number;
}

export interface ComponentUpdate {
  status?: AggregateHealth | TargetHealth;
  enabled?: boolean;
  description?: string;
  meta?: Record<string, unknown>;
  groupId?: number;
}

export interface IncidentInput {
  componentId: number;
  name: string;
  message: string;
}

/**
 * The narrow surface the engine and the provisioning tool use. Logical states
 * cross this interface; numeric Cachet codes stay inside the implementation.
 */
export interface StatusPageBackend {
  listComponents(): Promise<CachetComponent[]>;
  getComponent(id: number): Promise<CachetComponent>;
  findComponentIdByName(name: string): Promise<number | undefined>;
  createComponent(input: ComponentInput): Promise<number>;
  updateComponent(id: number, update: ComponentUpdate): Promise<void>;
  updateComponentStatus(id: number, status: AggregateHealth | TargetHealth): Promise<void>;
  deleteComponent(id: number): Promise<void>;

  listComponentGroups(): Promise<CachetComponentGroup[]>;
  createComponentGroup(name: string): Promise<number>;
  deleteComponentGroup(id: number): Promise<void>;

  listOpenIncidents(): Promise<CachetIncident[]>;
  createIncident(input: IncidentInput): Promise<number>;
  updateIncident(id: number, status: IncidentStatus, message?: string): Promise<void>;
}
