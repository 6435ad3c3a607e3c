/**
 * mantle fmt — Print the canonical form of a manifest
 *
 * Declarations first, in declaration order, then one chain statement per
 * relationship edge. Metaparameters come out as chain statements.
 */

import { Command } from 'commander';
import { printCatalog } from '@mantle/kernel';
import { compileOrReport, readManifest } from './context.js';

export const fmtCommand = new Command('fmt')
  .description('Print the manifest in canonical form')
  .argument('<file>', 'Manifest file')
  .action((file: string, _options: object, command: Command) => {
    const catalog = compileOrReport(readManifest(command, file));
    if (catalog !== undefined) {
      process.stdout.write(printCatalog(catalog));
    }
  });
