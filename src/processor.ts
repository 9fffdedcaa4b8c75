import { StatusPageBackend } from "./cachet/types";
import { reportBackendFailure } from "./errors";
import { IncidentLifecycleManager } from "./incidents";
import { WebhookMetrics } from "./metrics";
import { AlertNormalizer, NotificationBatch } from "./normalizer";
import { ComponentPublisher, targetFromComponent } from "./publisher";
import { DEFAULT_SETTINGS } from "./settings";
import { ServiceAggregator } from "./state/serviceAggregator";
import { TargetStateStore } from "./state/targetStore";
import { BridgeSettings, ProcessingSummary } from "./types";

export class AlertProcessor {
  readonly targets: TargetStateStore;
  readonly services: ServiceAggregator;
  private readonly publisher: ComponentPublisher;
  private readonly incidents: IncidentLifecycleManager;

  constructor(
    private readonly backend: StatusPageBackend,
    settings: BridgeSettings = DEFAULT_SETTINGS,
  ) {
    this.targets = new TargetStateStore();
    this.services = new ServiceAggregator(this.targets);
    this.publisher = new ComponentPublisher(backend);
    this.incidents = new IncidentLifecycleManager(backend, settings);
  }

  // Apply one notification batch, then bring every touched target and service up to date in the backend
  async processBatch(batch: NotificationBatch, metrics: WebhookMetrics): Promise<ProcessingSummary> {
    const normalizer = new AlertNormalizer(metrics);
    const touchedTargets = new Set<string>();
    const serviceMembers = new Map<string, Set<string>>();
    let processed = 0;

    for (const event of normalizer.normalize(batch)) {
      const result = await this.targets.apply(event);
      processed++;
      metrics.alertProcessed();
      const key = result.snapshot.componentName;
      touchedTargets.add(key);

      for (const service of result.snapshot.serviceNames) {
        const members = serviceMembers.get(service) ?? new Set<string>();
        members.add(key);
        serviceMembers.set(service, members);
      }
    }

    await Promise.all([
      ...[...touchedTargets].map((key) => this.publishTarget(key, metrics)),
      ...[...serviceMembers].map(([service, members]) => this.updateService(service, members, metrics)),
    ]);

    const summary: ProcessingSummary = {
      received: batch.alerts.length,
      processed,
      dropped: normalizer.stats.dropped,
      malformed: normalizer.stats.malformed,
    };
    console.log("Processed notification batch", { receiver: batch.receiver, ...summary });
    return summary;
  }

  /**
   * Rebuilds state from the backend's current components and open incidents,
   * then corrects whatever the backend shows that the rebuilt state disagrees with.
   */
  async hydrate(metrics: WebhookMetrics): Promise<void> {
    const [components, incidents] = await Promise.all([
      metrics.trackBackendCall(() => this.backend.listComponents()),
      metrics.trackBackendCall(() => this.backend.listOpenIncidents()),
    ]);

    // Newest open incident per component
    const openIncidents = new Map<number, number>();
    for (const incident of incidents) {
      if (incident.componentId === null) continue;
      const current = openIncidents.get(incident.componentId);
      if (current === undefined || incident.id > current) {
        openIncidents.set(incident.componentId, incident.id);
      }
    }

    const serviceMembers = new Map<string, Set<string>>();
    let targetCount = 0;
    let serviceCount = 0;

    for (const component of components) {
      const target = targetFromComponent(component);
      if (target !== undefined) {
        await this.targets.hydrate(target);
        targetCount++;
        for (const service of target.serviceNames) {
          const members = serviceMembers.get(service) ?? new Set<string>();
          members.add(target.componentName);
          serviceMembers.set(service, members);
        }
        continue;
      }

      await this.services.hydrate(component.name, {
        backendComponentId: component.id,
        publishedHealth: component.status,
        openIncidentId: openIncidents.get(component.id),
      });
      serviceCount++;
    }

    console.info("Hydrated state from status page", {
      targets: targetCount,
      services: serviceCount,
      openIncidents: openIncidents.size,
    });

    await Promise.all([
      ...this.targets.keys().map((key) => this.publishTarget(key, metrics)),
      ...[...serviceMembers].map(([service, members]) => this.updateService(service, members, metrics)),
    ]);
  }

  private async updateService(service: string, members: Iterable<string>, metrics: WebhookMetrics): Promise<void> {
    await this.services.recompute(service, members);
    await this.reconcileService(service, metrics);
  }

  // Single flight per service: whoever holds the loop keeps going until the backend matches
  private async reconcileService(service: string, metrics: WebhookMetrics): Promise<void> {
    let snapshot = await this.services.beginReconcile(service);
    while (snapshot !== undefined) {
      const outcome = await this.incidents.reconcile(snapshot, metrics);
      await this.services.finishReconcile(service, outcome.confirmation);
      // A failed step is retried on the next trigger for this service
      if (outcome.error !== undefined) return;
      snapshot = await this.services.beginReconcile(service);
    }
  }

  // Same single-flight loop for a target's own component
  private async publishTarget(key: string, metrics: WebhookMetrics): Promise<void> {
    let publication = await this.targets.beginPublish(key);
    while (publication !== undefined) {
      try {
        const confirmation = await this.publisher.publishTarget(publication, metrics);
        await this.targets.finishPublish(key, confirmation);
      } catch (error) {
        reportBackendFailure(`Publishing target '${key}'`, error, metrics, {
          instance: publication.snapshot.targetInstance,
        });
        await this.targets.finishPublish(key);
        return;
      }
      publication = await this.targets.beginPublish(key);
    }
  }
}
