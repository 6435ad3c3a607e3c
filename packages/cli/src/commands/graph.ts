/**
 * mantle graph — Print the catalog as Graphviz DOT
 *
 * Order edges are solid; notify edges are dashed and labelled `~>`.
 *
 *   mantle graph site.mf | dot -Tsvg > site.svg
 */

import { Command } from 'commander';
import { toDot } from '@mantle/kernel';
import { compileOrReport, readManifest } from './context.js';

export const graphCommand = new Command('graph')
  .description('Print the resource graph in Graphviz DOT format')
  .argument('<file>', 'Manifest file')
  .action((file: string, _options: object, command: Command) => {
    const catalog = compileOrReport(readManifest(command, file));
    if (catalog !== undefined) {
      process.stdout.write(toDot(catalog));
    }
  });
