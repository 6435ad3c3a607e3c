/**
 * mantle compile — Compile a manifest into a catalog
 *
 * Prints a summary, or the catalog as JSON with --json. --save writes the
 * catalog to `state/catalog.json` under the Mantle home and reports whether
 * it changed since the previous save. Every run is recorded in the compile
 * log.
 */

import { Command } from 'commander';
import { catalogToJson, isCatalogJson, renderCompileSummary, renderSaveNote, type CatalogJson } from '../output/catalog.js';
import { SAVED_CATALOG_FILE, compileOrReport, openHome, readManifest } from './context.js';

export const compileCommand = new Command('compile')
  .description('Compile a manifest and print a summary of the catalog')
  .argument('<file>', 'Manifest file')
  .option('--json', 'Print the catalog as JSON')
  .option('--save', 'Save the catalog to the Mantle home')
  .action((file: string, options: { json?: boolean; save?: boolean }, command: Command) => {
    const manifest = readManifest(command, file);
    const { stateIO, logger } = openHome(command);
    const catalog = compileOrReport(manifest, { logger });
    if (catalog === undefined) return;

    const json = catalogToJson(catalog);
    process.stdout.write(
      options.json === true ? JSON.stringify(json, null, 2) + '\n' : renderCompileSummary(catalog, manifest.sourceName),
    );

    if (options.save === true) {
      const previous = stateIO.readJson<CatalogJson | null>(SAVED_CATALOG_FILE, null, isCatalogJson);
      stateIO.writeJson(SAVED_CATALOG_FILE, json);
      if (options.json !== true) {
        process.stdout.write(renderSaveNote(previous, catalog));
      }
    }
  });
