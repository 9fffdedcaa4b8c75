import { AlertEvent, TargetApplyResult, TargetHealth, TargetPublication, TargetSnapshot, TargetState } from '../types';
import { KeyedMutex } from '../utils/keyedMutex';
import { targetComponentName } from '../utils';

// A target as read back from its backend component on cold start
export interface HydratedTarget {
  targetInstance: string;
  componentName: string;
  serviceNames: string[];
  activeAlerts: string[];
  critical: boolean;
  backendComponentId: number;
  publishedHealth: TargetHealth;
}

// What the backend confirmed for one publication
export interface TargetConfirmation {
  version: number;
  health: TargetHealth;
  backendComponentId: number;
}

export function targetKey(event: Pick<AlertEvent, 'targetInstance' | 'serviceLabel'>): string {
  return targetComponentName(event.targetInstance, event.serviceLabel);
}

function healthOf(activeAlerts: Set<string>): TargetHealth {
  return activeAlerts.size > 0 ? 'DOWN' : 'HEALTHY';
}

function snapshotOf(target: TargetState): TargetSnapshot {
  return {
    targetInstance: target.targetInstance,
    componentName: target.componentName,
    serviceNames: [...target.serviceNames],
    activeAlerts: [...target.activeAlerts],
    critical: target.critical,
    health: target.health,
    version: target.version,
  };
}

/**
 * Owns every TargetState, keyed by the target's component name
 * ("<instance> | <service label>"): one instance listed under two service
 * labels is two targets. Mutations of one target are serialized behind that
 * target's lock; different targets proceed independently. Everything done
 * under a lock is synchronous, so readers outside it always see a whole record.
 */
export class TargetStateStore {
  private readonly targets = new Map<string, TargetState>();
  private readonly locks = new KeyedMutex('target');

  async apply(event: AlertEvent): Promise<TargetApplyResult> {
    const key = targetKey(event);
    return this.locks.runExclusive(key, () => {
      const existing = this.targets.get(key);
      const created = existing === undefined;
      const target: TargetState = existing ?? {
        targetInstance: event.targetInstance,
        componentName: key,
        serviceNames: new Set(),
        activeAlerts: new Set(),
        critical: event.critical,
        health: 'HEALTHY',
        version: 0,
        publishedVersion: 0,
        publishing: false,
      };
      if (created) {
        this.targets.set(key, target);
      }

      const servicesAdded = event.serviceNames.filter((name) => !target.serviceNames.has(name));
      servicesAdded.forEach((name) => target.serviceNames.add(name));

      const previousHealth = target.health;
      const previousCritical = target.critical;
      const previousAlerts = target.activeAlerts.size;
      let alertsChanged: boolean;

      if (event.firing) {
        target.activeAlerts.add(event.alertName);
        alertsChanged = target.activeAlerts.size !== previousAlerts;
        // Sticky: a later non-critical event never clears the flag
        if (event.critical) target.critical = true;
      } else {
        alertsChanged = target.activeAlerts.delete(event.alertName);
      }

      target.health = healthOf(target.activeAlerts);
      const changed = target.health !== previousHealth;
      const criticalChanged = target.critical !== previousCritical;

      if (created || alertsChanged || criticalChanged || servicesAdded.length > 0) {
        target.version++;
      }

      return {
        health: target.health,
        changed,
        criticalChanged,
        servicesAdded,
        snapshot: snapshotOf(target),
      };
    });
  }

  snapshot(key: string): TargetSnapshot | undefined {
    const target = this.targets.get(key);
    return target === undefined ? undefined : snapshotOf(target);
  }

  keys(): string[] {
    return [...this.targets.keys()];
  }

  async hydrate(record: HydratedTarget): Promise<TargetSnapshot> {
    return this.locks.runExclusive(record.componentName, () => {
      const activeAlerts = new Set(record.activeAlerts);
      const health = healthOf(activeAlerts);
      const target: TargetState = {
        targetInstance: record.targetInstance,
        componentName: record.componentName,
        serviceNames: new Set(record.serviceNames),
        activeAlerts,
        critical: record.critical,
        health,
        backendComponentId: record.backendComponentId,
        version: 1,
        // A component whose status disagrees with its own alert detail is republished
        publishedVersion: health === record.publishedHealth ? 1 : 0,
        publishedHealth: record.publishedHealth,
        publishing: false,
      };
      this.targets.set(record.componentName, target);
      return snapshotOf(target);
    });
  }

  // Claims the right to publish this target. Undefined when another caller is
  // already publishing it or the backend already has the current version.
  async beginPublish(key: string): Promise<TargetPublication | undefined> {
    return this.locks.runExclusive(key, () => {
      const target = this.targets.get(key);
      if (target === undefined || target.publishing || target.version === target.publishedVersion) {
        return undefined;
      }
      target.publishing = true;
      return {
        snapshot: snapshotOf(target),
        previousHealth: target.publishedHealth,
        backendComponentId: target.backendComponentId,
      };
    });
  }

  // Releases the claim, recording what the backend confirmed (nothing on failure)
  async finishPublish(key: string, confirmation?: TargetConfirmation): Promise<void> {
    await this.locks.runExclusive(key, () => {
      const target = this.targets.get(key);
      if (target === undefined) return;
      target.publishing = false;
      if (confirmation !== undefined) {
        target.publishedVersion = confirmation.version;
        target.publishedHealth = confirmation.health;
        target.backendComponentId = confirmation.backendComponentId;
      }
    });
  }
}
