import { formatDiagnostic, type ManifestError } from '@mantle/kernel'
import { t } from '../theme.js'

/**
 * renderDiagnostics — one `file:line:column code: message` line per error,
 * in the order reported.
 */
export function renderDiagnostics(errors: ReadonlyArray<ManifestError>, file: string): string {
  return errors.map((error) => t.red(formatDiagnostic(error, file)) + '\n').join('')
}

export function renderCheckPassed(file: string, resources: number, edges: number): string {
  return t.green('✓') + ' ' + t.white(file) + t.muted(`  ok (${resources} resources, ${edges} edges)`) + '\n'
}
