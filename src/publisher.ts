import { CachetComponent, ComponentUpdate, StatusPageBackend } from './cachet/types';
import { WebhookMetrics } from './metrics';
import { HydratedTarget, TargetConfirmation } from './state/targetStore';
import { TargetPublication, TargetSnapshot } from './types';
import { splitServiceNames } from './utils';

const NAME_SEPARATOR = ' | ';

// Human-readable only; the typed state travels in `meta`
export function describeTarget(snapshot: Pick<TargetSnapshot, 'activeAlerts' | 'critical'>): string {
  const alerts = snapshot.activeAlerts.length > 0 ? `Active alerts: ${snapshot.activeAlerts.join(', ')}` : 'No active alerts';
  return snapshot.critical ? `${alerts} (critical target)` : alerts;
}

/**
 * Reads a target back from its invisible component. Components whose name is
 * not "<instance> | <service label>" are service components.
 */
export function targetFromComponent(component: CachetComponent): HydratedTarget | undefined {
  const separator = component.name.indexOf(NAME_SEPARATOR);
  if (separator <= 0) return undefined;

  const targetInstance = component.name.slice(0, separator);
  const serviceNames = splitServiceNames(component.name.slice(separator + NAME_SEPARATOR.length));
  if (serviceNames.length === 0) return undefined;

  const meta = component.meta;
  const rawAlerts: unknown = meta?.activeAlerts;
  const activeAlerts = Array.isArray(rawAlerts)
    ? rawAlerts.filter((alert: unknown): alert is string => typeof alert === 'string')
    : [];
  if (meta === null && component.status !== 'HEALTHY') {
    console.warn(`Target component '${component.name}' carries no alert detail, treating it as healthy`, {
      component: component.name,
      status: component.status,
    });
  }

  return {
    targetInstance,
    componentName: component.name,
    serviceNames,
    activeAlerts,
    critical: meta?.critical === true,
    backendComponentId: component.id,
    publishedHealth: component.status === 'HEALTHY' ? 'HEALTHY' : 'DOWN',
  };
}

// Writes target state to its invisible backend component, creating it on first use
export class ComponentPublisher {
  constructor(private readonly backend: StatusPageBackend) {}

  async publishTarget(publication: TargetPublication, metrics: WebhookMetrics): Promise<TargetConfirmation> {
    const { snapshot } = publication;
    const update: ComponentUpdate = {
      status: snapshot.health,
      description: describeTarget(snapshot),
      meta: { critical: snapshot.critical, activeAlerts: snapshot.activeAlerts },
    };

    let componentId =
      publication.backendComponentId ??
      (await metrics.trackBackendCall(() => this.backend.findComponentIdByName(snapshot.componentName)));

    if (componentId === undefined) {
      componentId = await metrics.trackBackendCall(() =>
        this.backend.createComponent({ ...update, name: snapshot.componentName, status: snapshot.health, enabled: false }),
      );
      console.info(`Created target component '${snapshot.componentName}'`, { componentId });
    } else {
      const id = componentId;
      await metrics.trackBackendCall(() => this.backend.updateComponent(id, update));
    }

    if (publication.previousHealth !== snapshot.health) {
      console.info('Component status changed', {
        component: snapshot.componentName,
        oldStatus: publication.previousHealth ?? 'UNKNOWN',
        newStatus: snapshot.health,
      });
      metrics.componentTransition();
    }

    return { version: snapshot.version, health: snapshot.health, backendComponentId: componentId };
  }
}
