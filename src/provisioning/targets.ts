import { readFileSync } from 'fs';
import YAML from 'yaml';
import { LABEL_CRITICAL, LABEL_ENABLED, LABEL_SERVICES } from '../normalizer';
import { getBoolean, isRecord, splitServiceNames, targetComponentName } from '../utils';

// One monitored target, as declared in the alerting source's target configuration
export interface DeclaredTarget {
  componentName: string;
  instance: string;
  job: string;
  serviceLabel: string;
  serviceNames: string[];
  critical: boolean;
}

export interface DeclaredTargets {
  targets: DeclaredTarget[];
  services: string[]; // distinct, sorted
}

function labelValue(value: unknown): string | boolean | number | undefined {
  if (typeof value === 'string' || typeof value === 'boolean' || typeof value === 'number') return value;
  return undefined;
}

/**
 * Reads the `prometheus_targets` section:
 *   prometheus_targets:
 *     <job>:
 *       - targets: [host:port, ...]
 *         labels: { status_page_alert: true, status_page_component: "Web, API", ... }
 * Only target groups with the enablement label are kept.
 */
export function parseDeclaredTargets(document: unknown): DeclaredTargets {
  // One entry per component name; the same target in several jobs is critical if any job says so
  const targets = new Map<string, DeclaredTarget>();
  const services = new Set<string>();

  const section = isRecord(document) ? document.prometheus_targets : undefined;
  if (!isRecord(section)) {
    console.warn("No 'prometheus_targets' section found in targets file");
    return { targets: [], services: [] };
  }

  for (const [job, groups] of Object.entries(section)) {
    if (!Array.isArray(groups)) continue;

    for (const group of groups) {
      if (!isRecord(group)) continue;
      const labels: Record<string, unknown> = isRecord(group.labels) ? group.labels : {};
      if (!getBoolean(labelValue(labels[LABEL_ENABLED]), false)) continue;

      const rawLabel = labels[LABEL_SERVICES];
      const serviceLabel = typeof rawLabel === 'string' ? rawLabel.trim() : '';
      const serviceNames = splitServiceNames(serviceLabel);
      if (serviceNames.length === 0) {
        console.warn(`Skipping target group in job '${job}': missing ${LABEL_SERVICES}`);
        continue;
      }
      serviceNames.forEach((name) => services.add(name));

      const critical = getBoolean(labelValue(labels[LABEL_CRITICAL]), false);
      const instances = Array.isArray(group.targets) ? group.targets : [];
      for (const instance of instances) {
        if (typeof instance !== 'string' || !instance) continue;
        const componentName = targetComponentName(instance, serviceLabel);
        const declared = targets.get(componentName);
        if (declared !== undefined) {
          declared.critical = declared.critical || critical;
          continue;
        }
        targets.set(componentName, { componentName, instance, job, serviceLabel, serviceNames, critical });
      }
    }
  }

  return { targets: [...targets.values()], services: [...services].sort() };
}

export function loadDeclaredTargets(filePath: string): DeclaredTargets {
  if (!/\.ya?ml$/.test(filePath)) {
    throw new Error(`Targets file must be a YAML file (.yml or .yaml): ${filePath}`);
  }
  return parseDeclaredTargets(YAML.parse(readFileSync(filePath, 'utf8')));
}
