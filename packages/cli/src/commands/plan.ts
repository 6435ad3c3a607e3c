/**
 * mantle plan — Print the dry-run execution plan
 *
 * Steps follow the catalog's topological order. Nothing is applied.
 */

import { Command } from 'commander';
import { buildPlan } from '@mantle/kernel';
import { ProviderSet } from '@mantle/runtime-host';
import { renderPlan } from '../output/plan.js';
import { compileOrReport, readManifest } from './context.js';

export const planCommand = new Command('plan')
  .description('Print the order in which resources would be applied')
  .argument('<file>', 'Manifest file')
  .action((file: string, _options: object, command: Command) => {
    const catalog = compileOrReport(readManifest(command, file));
    if (catalog !== undefined) {
      process.stdout.write(renderPlan(catalog, buildPlan(catalog), new ProviderSet()));
    }
  });
