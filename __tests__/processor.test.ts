import { describe, it, expect, beforeEach } from 'vitest';
import { WebhookMetrics } from '../src/metrics';
import { AlertProcessor } from '../src/processor';
import { FakeStatusPage } from './utils/fakeStatusPage';
import { createAlertRecord, createBatch } from './utils/test-fixtures';

describe('AlertProcessor', () => {
  let backend: FakeStatusPage;
  let processor: AlertProcessor;
  let metrics: WebhookMetrics;

  beforeEach(() => {
    backend = new FakeStatusPage();
    backend.seedComponent({ name: 'Web' });
    backend.seedComponent({ name: 'API' });
    processor = new AlertProcessor(backend);
    metrics = new WebhookMetrics();
  });

  const fire = (instance: string, alertName: string, extra: { critical?: string; services?: string } = {}) =>
    createAlertRecord({ instance, alertName, ...extra });
  const resolve = (instance: string, alertName: string, extra: { critical?: string; services?: string } = {}) =>
    createAlertRecord({ instance, alertName, status: 'resolved', ...extra });

  it('should follow a service through down, partial and back to healthy', async () => {
    await processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA')), metrics);
    await processor.processBatch(createBatch(fire('10.0.0.2:9100', 'alertB', { critical: 'true' })), metrics);

    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('DOWN');
    expect(backend.callCount('createIncident')).toBe(1);
    const [incident] = backend.openIncidents();

    await processor.processBatch(createBatch(resolve('10.0.0.2:9100', 'alertB', { critical: 'true' })), metrics);

    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('PARTIAL');
    expect(backend.componentByName('Web')?.status).toBe('PARTIAL');
    expect(backend.incidents.get(incident.id)?.status).toBe('INVESTIGATING');

    await processor.processBatch(createBatch(resolve('10.0.0.1:9100', 'alertA')), metrics);

    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('HEALTHY');
    expect(processor.services.snapshot('Web')?.openIncidentId).toBeUndefined();
    expect(backend.componentByName('Web')?.status).toBe('HEALTHY');
    expect(backend.incidents.get(incident.id)?.status).toBe('FIXED');
    expect(backend.callCount('createIncident')).toBe(1);
    expect(backend.callCount('updateIncident')).toBe(1);
  });

  it('should take a service down on its critical target alone', async () => {
    // Both targets known and healthy
    await processor.processBatch(
      createBatch(resolve('10.0.0.1:9100', 'alertA'), resolve('10.0.0.2:9100', 'alertB', { critical: 'true' })),
      metrics,
    );
    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('HEALTHY');

    await processor.processBatch(createBatch(fire('10.0.0.2:9100', 'alertB', { critical: 'true' })), metrics);

    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('DOWN');
    expect(backend.componentByName('Web')?.status).toBe('DOWN');
    expect(backend.openIncidents()).toHaveLength(1);
  });

  it('should mark a service partial when a non-critical member goes down', async () => {
    await processor.processBatch(
      createBatch(resolve('10.0.0.1:9100', 'alertA'), fire('10.0.0.2:9100', 'alertB')),
      metrics,
    );

    expect(processor.services.snapshot('Web')?.aggregateHealth).toBe('PARTIAL');
    expect(backend.openIncidents()).toEqual([]);
  });

  it('should publish the target component with its alert detail', async () => {
    await processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA', { critical: 'yes' })), metrics);

    const component = backend.componentByName('10.0.0.1:9100 | Web');
    expect(component).toMatchObject({
      status: 'DOWN',
      enabled: false,
      description: 'Active alerts: alertA (critical target)',
      meta: { critical: true, activeAlerts: ['alertA'] },
    });
  });

  it('should not write anything for a repeated identical delivery', async () => {
    const batch = createBatch(fire('10.0.0.1:9100', 'alertA'));
    await processor.processBatch(batch, metrics);
    const callsAfterFirst = backend.calls.length;

    await processor.processBatch(batch, metrics);

    expect(backend.calls.length).toBe(callsAfterFirst);
    expect(backend.callCount('createIncident')).toBe(1);
  });

  it('should open exactly one incident for overlapping concurrent deliveries', async () => {
    await Promise.all([
      processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA')), metrics),
      processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertB')), metrics),
      processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA')), metrics),
    ]);

    expect(backend.callCount('createIncident')).toBe(1);
    const meta = backend.componentByName('10.0.0.1:9100 | Web')?.meta;
    expect(meta?.critical).toBe(false);
    expect(meta?.activeAlerts).toHaveLength(2);
    expect(meta?.activeAlerts).toEqual(expect.arrayContaining(['alertA', 'alertB']));
  });

  it('should fan out to every service in the label', async () => {
    await processor.processBatch(createBatch(fire('10.0.0.3:9100', 'alertC', { services: 'Web, API' })), metrics);

    expect(backend.componentByName('Web')?.status).toBe('DOWN');
    expect(backend.componentByName('API')?.status).toBe('DOWN');
    expect(backend.componentByName('10.0.0.3:9100 | Web, API')).toBeDefined();
    expect(backend.openIncidents()).toHaveLength(2);
  });

  it('should keep an instance listed under two service labels apart', async () => {
    backend.seedComponent({ name: 'Docs' });
    await processor.processBatch(createBatch(resolve('h:9100', 'NodeDown', { services: 'API' })), metrics);

    await processor.processBatch(createBatch(fire('h:9100', 'ProbeFailed', { services: 'Docs' })), metrics);

    expect(backend.componentByName('API')?.status).toBe('HEALTHY');
    expect(backend.componentByName('Docs')?.status).toBe('DOWN');
    expect(backend.componentByName('h:9100 | API')?.status).toBe('HEALTHY');
    expect(backend.componentByName('h:9100 | Docs')).toMatchObject({
      status: 'DOWN',
      meta: { critical: false, activeAlerts: ['ProbeFailed'] },
    });
    expect(backend.openIncidents()).toHaveLength(1);
    expect(backend.openIncidents()[0].componentId).toBe(backend.componentByName('Docs')?.id);
  });

  it('should retry a failed incident on the next trigger for the service', async () => {
    backend.failNext('createIncident');

    await processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA')), metrics);
    expect(backend.openIncidents()).toEqual([]);
    expect(processor.services.snapshot('Web')?.openIncidentId).toBeUndefined();

    // Same alert delivered again
    await processor.processBatch(createBatch(fire('10.0.0.1:9100', 'alertA')), metrics);

    expect(backend.openIncidents()).toHaveLength(1);
    expect(processor.services.snapshot('Web')?.openIncidentId).toBe(backend.openIncidents()[0].id);
  });

  it('should summarize processed, dropped and malformed records', async () => {
    const summary = await processor.processBatch(
      createBatch(
        fire('10.0.0.1:9100', 'alertA'),
        createAlertRecord({ enabled: 'false' }),
        { status: 'firing', labels: { alertname: 'X', instance: 'h:1', status_page_alert: 'true' } },
      ),
      metrics,
    );

    expect(summary).toEqual({ received: 3, processed: 1, dropped: 1, malformed: 1 });
    expect(metrics.getCount('alerts.processed')).toBe(1);
  });

  describe('hydrate', () => {
    it('should rebuild targets, services and open incidents from the backend', async () => {
      const webId = backend.componentByName('Web')?.id ?? -1;
      await backend.updateComponentStatus(webId, 'DOWN');
      const incidentId = backend.seedIncident(webId);
      backend.seedComponent({
        name: '10.0.0.1:9100 | Web',
        status: 'DOWN',
        enabled: false,
        meta: { critical: false, activeAlerts: ['alertA'] },
      });
      backend.calls.length = 0;

      await processor.hydrate(metrics);

      expect(processor.targets.snapshot('10.0.0.1:9100 | Web')?.activeAlerts).toEqual(['alertA']);
      expect(processor.services.snapshot('Web')).toMatchObject({
        aggregateHealth: 'DOWN',
        publishedHealth: 'DOWN',
        openIncidentId: incidentId,
        backendComponentId: webId,
      });
      // Consistent state: nothing to write
      expect(backend.calls.sort()).toEqual(['listComponents', 'listOpenIncidents']);

      // A resolution after the restart closes the incident opened before it
      await processor.processBatch(createBatch(resolve('10.0.0.1:9100', 'alertA')), metrics);

      expect(backend.incidents.get(incidentId)?.status).toBe('FIXED');
      expect(backend.callCount('createIncident')).toBe(0);
    });

    it('should keep an outage on one component of an instance across a restart', async () => {
      const docsId = backend.seedComponent({ name: 'Docs', status: 'DOWN' });
      const incidentId = backend.seedIncident(docsId);
      backend.seedComponent({
        name: 'h:9100 | Docs',
        status: 'DOWN',
        enabled: false,
        meta: { critical: false, activeAlerts: ['ProbeFailed'] },
      });
      backend.seedComponent({
        name: 'h:9100 | API',
        status: 'HEALTHY',
        enabled: false,
        meta: { critical: false, activeAlerts: [] },
      });

      await processor.hydrate(metrics);

      expect(processor.services.snapshot('Docs')?.aggregateHealth).toBe('DOWN');
      expect(processor.services.snapshot('API')?.aggregateHealth).toBe('HEALTHY');
      expect(backend.componentByName('Docs')?.status).toBe('DOWN');
      expect(backend.incidents.get(incidentId)?.status).toBe('INVESTIGATING');
      expect(backend.callCount('updateComponentStatus')).toBe(0);
    });

    it('should correct a service whose status disagrees with its targets', async () => {
      const webId = backend.componentByName('Web')?.id ?? -1;
      await backend.updateComponentStatus(webId, 'DOWN');
      backend.seedIncident(webId);
      backend.seedComponent({
        name: '10.0.0.1:9100 | Web',
        status: 'HEALTHY',
        enabled: false,
        meta: { critical: false, activeAlerts: [] },
      });

      await processor.hydrate(metrics);

      expect(backend.componentByName('Web')?.status).toBe('HEALTHY');
      expect(backend.openIncidents()).toEqual([]);
    });
  });
});
