/**
 * @mantle/cli
 *
 * The `mantle` command-line program and the renderers behind its output.
 */

export { program } from './commands/index.js'
export { catalogToJson, isCatalogJson, renderCompileSummary, renderSaveNote } from './output/catalog.js'
export type { CatalogJson } from './output/catalog.js'
export { renderCheckPassed, renderDiagnostics } from './output/diagnostics.js'
export { renderPlan } from './output/plan.js'
export type { Describer } from './output/plan.js'
export { latest, renderLog, renderLogEntry } from './output/log.js'
