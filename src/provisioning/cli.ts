#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { CachetClient } from '../cachet/cachetClient';
import { StatusPageBackend } from '../cachet/types';
import { errorMessage } from '../errors';
import { componentToGroupMap, loadSettings } from '../settings';
import { buildPlan, Provisioner, ProvisioningSummary } from './provisioner';
import { loadDeclaredTargets } from './targets';

export interface ProvisionOptions {
  file?: string;
  config: string;
  reset?: boolean;
  justDelete?: boolean;
  dryRun?: boolean;
}

function printSummary(summary: ProvisioningSummary) {
  console.log('\nProvisioning completed');
  console.log(`  Created: ${summary.created}`);
  console.log(`  Updated: ${summary.updated}`);
  console.log(`  Deleted: ${summary.deleted}`);
  console.log(`  Skipped: ${summary.skipped}`);
  console.log(`  Failed:  ${summary.failed}`);
}

export async function runProvision(options: ProvisionOptions, backend?: StatusPageBackend): Promise<ProvisioningSummary> {
  const settings = loadSettings(options.config);
  const client = backend ?? CachetClient.fromConfig(settings.cachet_per_page_param);
  const provisioner = new Provisioner(client, { dryRun: options.dryRun });

  if (options.justDelete) {
    console.log('Deleting every component and component group');
    return provisioner.deleteAll();
  }

  if (!options.file) {
    throw new Error('--file is required unless --just-delete is given');
  }
  const declared = loadDeclaredTargets(options.file);
  console.log(`Found ${declared.targets.length} targets and ${declared.services.length} services in ${options.file}`);

  const plan = buildPlan(declared, componentToGroupMap(settings));
  return provisioner.sync(plan, options.reset ?? false);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('status-bridge-provision')
    .description('Create status page groups and components from the alerting target configuration')
    .option('-f, --file <path>', 'targets YAML file with a prometheus_targets section')
    .option('-c, --config <path>', 'settings JSON file with groups_configuration', process.env.STATUS_BRIDGE_CONFIG ?? 'config.json')
    .option('--reset', 'delete components and groups that are not in the configuration')
    .option('--just-delete', 'delete every component and group, create nothing')
    .option('--dry-run', 'show what would change without writing anything')
    .action(async (opts: ProvisionOptions) => {
      if (opts.reset && opts.justDelete) {
        program.error('--reset and --just-delete cannot be combined');
      }
      const summary = await runProvision(opts);
      printSummary(summary);
      if (summary.failed > 0) process.exitCode = 1;
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`Provisioning failed: ${errorMessage(error)}`);
      process.exit(1);
    });
}
