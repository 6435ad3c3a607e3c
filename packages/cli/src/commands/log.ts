/**
 * mantle log — Show the compile log
 *
 * Reads `logs/compiles.jsonl` under the Mantle home, deduplicated and sorted
 * by time, and prints the most recent entries.
 */

import { Command, InvalidArgumentError } from 'commander';
import { COMPILE_LOG_FILE, readLog } from '@mantle/runtime-host';
import { latest, renderLog } from '../output/log.js';
import { openHome } from './context.js';

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return limit;
}

export const logCommand = new Command('log')
  .description('Show recent compilations')
  .option('--limit <n>', 'Maximum number of entries to show', parseLimit, 20)
  .option('--json', 'Output as JSON')
  .action((options: { limit: number; json?: boolean }, command: Command) => {
    const { stateIO } = openHome(command);
    const result = readLog(stateIO.readLogRaw(COMPILE_LOG_FILE));

    if (options.json === true) {
      process.stdout.write(JSON.stringify(latest(result.events, options.limit), null, 2) + '\n');
      return;
    }
    process.stdout.write(renderLog(result, options.limit));
  });
