import { describe, it, expect, beforeEach } from 'vitest';
import { CachetComponent } from '../src/cachet/types';
import { WebhookMetrics } from '../src/metrics';
import { ComponentPublisher, describeTarget, targetFromComponent } from '../src/publisher';
import { TargetSnapshot } from '../src/types';
import { FakeStatusPage } from './utils/fakeStatusPage';

function component(overrides: Partial<CachetComponent> = {}): CachetComponent {
  return {
    id: 9,
    name: '10.0.0.1:9100 | Web, API',
    status: 'DOWN',
    statusCode: 4,
    enabled: false,
    description: '',
    meta: { critical: true, activeAlerts: ['alertA', 7] },
    groupId: null,
    ...overrides,
  };
}

describe('describeTarget', () => {
  it.each([
    [[], false, 'No active alerts'],
    [['a', 'b'], false, 'Active alerts: a, b'],
    [['a'], true, 'Active alerts: a (critical target)'],
  ])('should describe %j (critical %s)', (activeAlerts, critical, expected) => {
    expect(describeTarget({ activeAlerts, critical })).toBe(expected);
  });
});

describe('targetFromComponent', () => {
  it('should read a target component back', () => {
    expect(targetFromComponent(component())).toEqual({
      targetInstance: '10.0.0.1:9100',
      componentName: '10.0.0.1:9100 | Web, API',
      serviceNames: ['Web', 'API'],
      activeAlerts: ['alertA'],
      critical: true,
      backendComponentId: 9,
      publishedHealth: 'DOWN',
    });
  });

  it('should ignore service components', () => {
    expect(targetFromComponent(component({ name: 'Web' }))).toBeUndefined();
    expect(targetFromComponent(component({ name: ' | Web' }))).toBeUndefined();
    expect(targetFromComponent(component({ name: 'host:1 | ' }))).toBeUndefined();
  });

  it('should treat a component without alert detail as a healthy target', () => {
    const target = targetFromComponent(component({ meta: null, status: 'PARTIAL' }));

    expect(target).toMatchObject({ activeAlerts: [], critical: false, publishedHealth: 'DOWN' });
    expect(console.warn).toHaveBeenCalledWith(
      "Target component '10.0.0.1:9100 | Web, API' carries no alert detail, treating it as healthy",
      { component: '10.0.0.1:9100 | Web, API', status: 'PARTIAL' },
    );
  });
});

describe('ComponentPublisher', () => {
  let backend: FakeStatusPage;
  let metrics: WebhookMetrics;
  const snapshot: TargetSnapshot = {
    targetInstance: '10.0.0.1:9100',
    componentName: '10.0.0.1:9100 | Web',
    serviceNames: ['Web'],
    activeAlerts: ['alertA'],
    critical: false,
    health: 'DOWN',
    version: 3,
  };

  beforeEach(() => {
    backend = new FakeStatusPage();
    metrics = new WebhookMetrics();
  });

  it('should create a hidden component on first publication', async () => {
    const confirmation = await new ComponentPublisher(backend).publishTarget({ snapshot }, metrics);

    const created = backend.componentByName('10.0.0.1:9100 | Web');
    expect(confirmation).toEqual({ version: 3, health: 'DOWN', backendComponentId: created?.id });
    expect(created).toMatchObject({
      status: 'DOWN',
      enabled: false,
      description: 'Active alerts: alertA',
      meta: { critical: false, activeAlerts: ['alertA'] },
    });
    expect(metrics.getCount('components.transitions')).toBe(1);
  });

  it('should update a known component without looking it up', async () => {
    const id = backend.seedComponent({ name: '10.0.0.1:9100 | Web', enabled: false });

    await new ComponentPublisher(backend).publishTarget(
      { snapshot: { ...snapshot, activeAlerts: ['alertA', 'alertB'] }, previousHealth: 'DOWN', backendComponentId: id },
      metrics,
    );

    expect(backend.calls).toEqual(['updateComponent']);
    expect(backend.components.get(id)?.description).toBe('Active alerts: alertA, alertB');
    expect(metrics.getCount('components.transitions')).toBe(0);
  });

  it('should find an existing component by name', async () => {
    const id = backend.seedComponent({ name: '10.0.0.1:9100 | Web', enabled: false });

    const confirmation = await new ComponentPublisher(backend).publishTarget({ snapshot, previousHealth: 'HEALTHY' }, metrics);

    expect(backend.calls).toEqual(['findComponentIdByName', 'updateComponent']);
    expect(confirmation.backendComponentId).toBe(id);
    expect(backend.components.get(id)?.status).toBe('DOWN');
  });
});
