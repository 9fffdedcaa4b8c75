import { AggregateHealth, AggregateTransition, ServiceSnapshot, ServiceState, TargetSnapshot } from '../types';
import { KeyedMutex } from '../utils/keyedMutex';
import { TargetStateStore } from './targetStore';

// Backend-confirmed facts about a service. openIncidentId null means the incident was closed.
export interface ServiceConfirmation {
  backendComponentId?: number;
  publishedHealth?: AggregateHealth;
  openIncidentId?: number | null;
}

/**
 * Aggregate health of a service from its members' health and critical flags.
 * Depends on nothing but the snapshot, so a restart re-derives the same value.
 */
export function aggregateHealth(members: Array<Pick<TargetSnapshot, 'health' | 'critical'>>): AggregateHealth {
  if (members.some((m) => m.critical && m.health === 'DOWN')) return 'DOWN';
  if (members.every((m) => m.health === 'HEALTHY')) return 'HEALTHY';
  if (members.every((m) => m.health === 'DOWN')) return 'DOWN';
  return 'PARTIAL';
}

// Whether the backend already shows what the service's aggregate calls for
export function isInSync(service: ServiceSnapshot): boolean {
  if (service.publishedHealth !== service.aggregateHealth) return false;
  if (service.aggregateHealth === 'DOWN') return service.openIncidentId !== undefined;
  if (service.aggregateHealth === 'HEALTHY') return service.openIncidentId === undefined;
  // Partial keeps whatever incident is open
  return true;
}

function snapshotOf(service: ServiceState): ServiceSnapshot {
  return {
    name: service.name,
    aggregateHealth: service.aggregateHealth,
    publishedHealth: service.publishedHealth,
    openIncidentId: service.openIncidentId,
    backendComponentId: service.backendComponentId,
  };
}

export class ServiceAggregator {
  private readonly services = new Map<string, ServiceState>();
  private readonly locks = new KeyedMutex('service');

  constructor(private readonly targets: TargetStateStore) {}

  private getOrCreate(name: string): ServiceState {
    let service = this.services.get(name);
    if (service === undefined) {
      service = {
        name,
        memberTargets: new Set(),
        aggregateHealth: 'HEALTHY',
        reconciling: false,
      };
      this.services.set(name, service);
    }
    return service;
  }

  /**
   * Recomputes the aggregate of one service from current target snapshots,
   * first adding `newMembers` (target keys) to it. Returns the transition, if any.
   */
  async recompute(name: string, newMembers: Iterable<string> = []): Promise<AggregateTransition | undefined> {
    return this.locks.runExclusive(name, () => {
      const service = this.getOrCreate(name);
      for (const member of newMembers) service.memberTargets.add(member);

      const members: TargetSnapshot[] = [];
      for (const key of service.memberTargets) {
        const snapshot = this.targets.snapshot(key);
        if (snapshot !== undefined) members.push(snapshot);
      }

      const previous = service.aggregateHealth;
      service.aggregateHealth = aggregateHealth(members);
      if (previous === service.aggregateHealth) return undefined;

      console.info(`Service '${name}' aggregate health changed`, {
        service: name,
        oldStatus: previous,
        newStatus: service.aggregateHealth,
        members: members.length,
      });
      return { service: name, previous, next: service.aggregateHealth };
    });
  }

  // Records a service read back from the backend on cold start
  async hydrate(name: string, confirmation: ServiceConfirmation): Promise<void> {
    await this.locks.runExclusive(name, () => {
      const service = this.getOrCreate(name);
      this.confirm(service, confirmation);
      // Until members are known the aggregate mirrors what the backend shows
      if (service.memberTargets.size === 0 && confirmation.publishedHealth !== undefined) {
        service.aggregateHealth = confirmation.publishedHealth;
      }
    });
  }

  snapshot(name: string): ServiceSnapshot | undefined {
    const service = this.services.get(name);
    return service === undefined ? undefined : snapshotOf(service);
  }

  members(name: string): string[] {
    return [...(this.services.get(name)?.memberTargets ?? [])];
  }

  names(): string[] {
    return [...this.services.keys()];
  }

  // Claims the reconcile loop for a service that is out of sync with the backend
  async beginReconcile(name: string): Promise<ServiceSnapshot | undefined> {
    return this.locks.runExclusive(name, () => {
      const service = this.services.get(name);
      if (service === undefined || service.reconciling) return undefined;

      const snapshot = snapshotOf(service);
      if (isInSync(snapshot)) return undefined;

      service.reconciling = true;
      return snapshot;
    });
  }

  async finishReconcile(name: string, confirmation: ServiceConfirmation): Promise<void> {
    await this.locks.runExclusive(name, () => {
      const service = this.services.get(name);
      if (service === undefined) return;
      service.reconciling = false;
      this.confirm(service, confirmation);
    });
  }

  private confirm(service: ServiceState, confirmation: ServiceConfirmation) {
    if (confirmation.backendComponentId !== undefined) {
      service.backendComponentId = confirmation.backendComponentId;
    }
    if (confirmation.publishedHealth !== undefined) {
      service.publishedHealth = confirmation.publishedHealth;
    }
    if (confirmation.openIncidentId === null) {
      service.openIncidentId = undefined;
    } else if (confirmation.openIncidentId !== undefined) {
      service.openIncidentId = confirmation.openIncidentId;
    }
  }
}
