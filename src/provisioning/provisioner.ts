import { CachetComponent, StatusPageBackend } from '../cachet/types';
import { errorMessage } from '../errors';
import { describeTarget } from '../publisher';
import { DeclaredTarget, DeclaredTargets } from './targets';

export interface ProvisioningPlan {
  targets: DeclaredTarget[];
  groups: string[]; // sorted, only groups with at least one service
  services: Array<{ name: string; group: string }>;
  unmapped: string[]; // services with no group mapping, left out
}

export interface ProvisioningSummary {
  created: number;
  updated: number;
  deleted: number;
  skipped: number;
  failed: number;
}

export interface ProvisionerOptions {
  dryRun?: boolean;
}

export function buildPlan(declared: DeclaredTargets, componentToGroup: Map<string, string>): ProvisioningPlan {
  const services: ProvisioningPlan['services'] = [];
  const unmapped: string[] = [];
  const groups = new Set<string>();

  for (const name of declared.services) {
    const group = componentToGroup.get(name);
    if (group === undefined) {
      console.warn(`Component '${name}' has no group mapping, skipping it`);
      unmapped.push(name);
      continue;
    }
    groups.add(group);
    services.push({ name, group });
  }

  return { targets: declared.targets, groups: [...groups].sort(), services, unmapped };
}

export function emptySummary(): ProvisioningSummary {
  return { created: 0, updated: 0, deleted: 0, skipped: 0, failed: 0 };
}

/**
 * Idempotent bulk setup of groups and components. Records are matched by
 * name, so running it twice creates nothing the second time.
 */
export class Provisioner {
  private readonly dryRun: boolean;

  constructor(
    private readonly backend: StatusPageBackend,
    options: ProvisionerOptions = {},
  ) {
    this.dryRun = options.dryRun ?? false;
  }

  async sync(plan: ProvisioningPlan, reset = false): Promise<ProvisioningSummary> {
    const summary = emptySummary();
    summary.skipped += plan.unmapped.length;

    const groupIds = await this.syncGroups(plan, summary);
    const existing = new Map(
      (await this.backend.listComponents()).map((c): [string, CachetComponent] => [c.name, c]),
    );

    for (const target of plan.targets) {
      await this.step(summary, `target component '${target.componentName}'`, () =>
        this.syncTarget(target, existing.get(target.componentName)),
      );
    }

    for (const service of plan.services) {
      const groupId = groupIds.get(service.group);
      if (groupId === undefined) {
        console.warn(`Skipping component '${service.name}': group '${service.group}' was not created`);
        summary.skipped++;
        continue;
      }
      await this.step(summary, `service component '${service.name}'`, () =>
        this.syncService(service.name, groupId, existing.get(service.name)),
      );
    }

    if (reset) {
      const wanted = new Set([...plan.targets.map((t) => t.componentName), ...plan.services.map((s) => s.name)]);
      await this.deleteComponents([...existing.values()].filter((c) => !wanted.has(c.name)), summary);
      const groups = await this.backend.listComponentGroups();
      await this.deleteGroups(groups.filter((g) => !plan.groups.includes(g.name)), summary);
    }

    return summary;
  }

  // Removes every component and group
  async deleteAll(): Promise<ProvisioningSummary> {
    const summary = emptySummary();
    await this.deleteComponents(await this.backend.listComponents(), summary);
    await this.deleteGroups(await this.backend.listComponentGroups(), summary);
    return summary;
  }

  private async syncGroups(plan: ProvisioningPlan, summary: ProvisioningSummary): Promise<Map<string, number>> {
    const groupIds = new Map(
      (await this.backend.listComponentGroups()).map((g): [string, number] => [g.name, g.id]),
    );

    for (const group of plan.groups) {
      if (groupIds.has(group)) continue;
      await this.step(summary, `component group '${group}'`, async () => {
        if (this.dryRun) {
          console.log(`[dry-run] would create component group '${group}'`);
          // Placeholder id so dependent components show up in the dry run
          groupIds.set(group, -1);
          return 'created';
        }
        const id = await this.backend.createComponentGroup(group);
        groupIds.set(group, id);
        console.log(`Component group created: ${group} (ID: ${id})`);
        return 'created';
      });
    }
    return groupIds;
  }

  private async syncTarget(target: DeclaredTarget, existing?: CachetComponent): Promise<'created' | 'updated' | 'unchanged'> {
    if (existing === undefined) {
      if (this.dryRun) {
        console.log(`[dry-run] would create target component '${target.componentName}'`);
        return 'created';
      }
      const id = await this.backend.createComponent({
        name: target.componentName,
        status: 'HEALTHY',
        enabled: false,
        description: describeTarget({ activeAlerts: [], critical: target.critical }),
        meta: { critical: target.critical, activeAlerts: [] },
      });
      console.log(`Target component created: ${target.componentName}${target.critical ? ' [CRITICAL]' : ''} (ID: ${id})`);
      return 'created';
    }

    const criticalDiffers = existing.meta?.critical !== target.critical;
    if (!existing.enabled && !criticalDiffers) return 'unchanged';

    if (this.dryRun) {
      console.log(`[dry-run] would update target component '${target.componentName}'`);
      return 'updated';
    }
    const rawAlerts: unknown = existing.meta?.activeAlerts;
    const activeAlerts = Array.isArray(rawAlerts) ? rawAlerts.filter((a: unknown): a is string => typeof a === 'string') : [];
    await this.backend.updateComponent(existing.id, {
      enabled: false,
      description: describeTarget({ activeAlerts, critical: target.critical }),
      meta: { critical: target.critical, activeAlerts },
    });
    console.log(`Target component updated: ${target.componentName} (ID: ${existing.id})`);
    return 'updated';
  }

  private async syncService(name: string, groupId: number, existing?: CachetComponent): Promise<'created' | 'updated' | 'unchanged'> {
    if (existing === undefined) {
      if (this.dryRun) {
        console.log(`[dry-run] would create service component '${name}'`);
        return 'created';
      }
      const id = await this.backend.createComponent({ name, status: 'HEALTHY', enabled: true, groupId });
      console.log(`Service component created: ${name} (ID: ${id})`);
      return 'created';
    }

    if (existing.enabled && existing.groupId === groupId) return 'unchanged';

    if (this.dryRun) {
      console.log(`[dry-run] would move service component '${name}' to group ${groupId}`);
      return 'updated';
    }
    await this.backend.updateComponent(existing.id, { enabled: true, groupId });
    console.log(`Service component updated: ${name} (ID: ${existing.id}, group ${groupId})`);
    return 'updated';
  }

  private async deleteComponents(components: CachetComponent[], summary: ProvisioningSummary): Promise<void> {
    for (const component of components) {
      await this.step(summary, `deleting component '${component.name}'`, async () => {
        if (this.dryRun) {
          console.log(`[dry-run] would delete component '${component.name}' (ID: ${component.id})`);
        } else {
          await this.backend.deleteComponent(component.id);
          console.log(`Deleted component: ${component.name} (ID: ${component.id})`);
        }
        return 'deleted';
      });
    }
  }

  private async deleteGroups(groups: Array<{ id: number; name: string }>, summary: ProvisioningSummary): Promise<void> {
    for (const group of groups) {
      await this.step(summary, `deleting component group '${group.name}'`, async () => {
        if (this.dryRun) {
          console.log(`[dry-run] would delete component group '${group.name}' (ID: ${group.id})`);
        } else {
          await this.backend.deleteComponentGroup(group.id);
          console.log(`Deleted component group: ${group.name} (ID: ${group.id})`);
        }
        return 'deleted';
      });
    }
  }

  // One failed record does not stop the run
  private async step(
    summary: ProvisioningSummary,
    what: string,
    fn: () => Promise<'created' | 'updated' | 'deleted' | 'unchanged'>,
  ): Promise<void> {
    try {
      const outcome = await fn();
      if (outcome !== 'unchanged') summary[outcome]++;
    } catch (error) {
      console.error(`Error on ${what}`, { error: errorMessage(error) });
      summary.failed++;
    }
  }
}
