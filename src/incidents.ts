import { StatusPageBackend } from './cachet/types';
import { BackendPermanentError, reportBackendFailure } from './errors';
import { WebhookMetrics } from './metrics';
import { incidentTitle } from './settings';
import { ServiceConfirmation } from './state/serviceAggregator';
import { BridgeSettings, ServiceSnapshot } from './types';

export interface ReconcileOutcome {
  // Everything the backend confirmed, including steps done before a failure
  confirmation: ServiceConfirmation;
  error?: unknown;
}

/**
 * Moves the backend towards a service's aggregate health: component status
 * first, then the incident. An incident is opened when the service is Down
 * with none open, and closed only once the service is Healthy again, so
 * Down -> Partial -> Down stays one incident.
 */
export class IncidentLifecycleManager {
  constructor(
    private readonly backend: StatusPageBackend,
    private readonly settings: BridgeSettings,
  ) {}

  async reconcile(service: ServiceSnapshot, metrics: WebhookMetrics): Promise<ReconcileOutcome> {
    const confirmation: ServiceConfirmation = {};
    const desired = service.aggregateHealth;

    try {
      const componentId = service.backendComponentId ?? (await this.resolveComponent(service.name, metrics));
      confirmation.backendComponentId = componentId;

      if (service.publishedHealth !== desired) {
        await metrics.trackBackendCall(() => this.backend.updateComponentStatus(componentId, desired));
        console.info('Component status changed', {
          component: service.name,
          oldStatus: service.publishedHealth ?? 'UNKNOWN',
          newStatus: desired,
        });
        metrics.componentTransition();
        confirmation.publishedHealth = desired;
      }

      if (desired === 'DOWN' && service.openIncidentId === undefined) {
        confirmation.openIncidentId = await this.openIncident(service.name, componentId, metrics);
      } else if (desired === 'HEALTHY' && service.openIncidentId !== undefined) {
        await this.closeIncident(service.name, service.openIncidentId, metrics);
        confirmation.openIncidentId = null;
      }

      return { confirmation };
    } catch (error) {
      reportBackendFailure(`Reconciling service '${service.name}'`, error, metrics, {
        service: service.name,
        desired,
      });
      return { confirmation, error };
    }
  }

  private async resolveComponent(name: string, metrics: WebhookMetrics): Promise<number> {
    const id = await metrics.trackBackendCall(() => this.backend.findComponentIdByName(name));
    if (id === undefined) {
      throw new BackendPermanentError(`Service component '${name}' does not exist, run provisioning first`);
    }
    return id;
  }

  private async openIncident(serviceName: string, componentId: number, metrics: WebhookMetrics): Promise<number> {
    const incidentId = await metrics.trackBackendCall(() =>
      this.backend.createIncident({
        componentId,
        name: incidentTitle(this.settings, serviceName),
        message: this.settings.new_incident_message,
      }),
    );
    console.info(`Opened incident ${incidentId} for '${serviceName}'`, { service: serviceName, incidentId });
    metrics.incidentOpened();
    return incidentId;
  }

  private async closeIncident(serviceName: string, incidentId: number, metrics: WebhookMetrics): Promise<void> {
    try {
      await metrics.trackBackendCall(() =>
        this.backend.updateIncident(incidentId, 'FIXED', this.settings.resolved_incident_message),
      );
    } catch (error) {
      // Deleted by an operator in the meantime: nothing left to close
      if (!(error instanceof BackendPermanentError && error.status === 404)) throw error;
      console.warn(`Incident ${incidentId} for '${serviceName}' no longer exists`, { service: serviceName, incidentId });
      return;
    }
    console.info(`Resolved incident ${incidentId} for '${serviceName}'`, { service: serviceName, incidentId });
    metrics.incidentClosed();
  }
}
