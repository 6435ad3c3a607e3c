/**
 * mantle check — Report every diagnostic in a manifest
 *
 * Prints `file:line:column code: message` per error and exits with code 1
 * when compilation fails. The run is recorded in the compile log.
 */

import { Command } from 'commander';
import { renderCheckPassed } from '../output/diagnostics.js';
import { compileOrReport, openHome, readManifest } from './context.js';

export const checkCommand = new Command('check')
  .description('Check a manifest and report every error')
  .argument('<file>', 'Manifest file')
  .action((file: string, _options: object, command: Command) => {
    const manifest = readManifest(command, file);
    const { logger } = openHome(command);
    const catalog = compileOrReport(manifest, { logger });
    if (catalog !== undefined) {
      process.stdout.write(renderCheckPassed(manifest.sourceName, catalog.nodes.length, catalog.edges.length));
    }
  });
