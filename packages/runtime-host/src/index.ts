/**
 * @mantle/runtime-host
 *
 * Mantle runtime host: side-effectful implementations of the interfaces the
 * kernel declares. File-backed state, the compile log, home resolution and
 * the dry-run providers that describe an execution plan.
 *
 * No kernel code imports from this package.
 */

// StateIO
export type { JsonGuard, StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// MANTLE_HOME resolution
export type { ResolveMantleHomeOptions } from './home.js';
export {
  MANTLE_HOME_ENV,
  resolveMantleHome,
  getOsConfigPath,
  readMantleHomeFromConfig,
  writeMantleHomeToConfig,
} from './home.js';

// Compile log
export { COMPILE_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export { ulid } from './logging/ulid.js';
export type { LogEvent, LogReadStats, LogReadResult } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Providers
export {
  ExecProvider,
  FileProvider,
  GenericProvider,
  ProviderSet,
  ServiceProvider,
  attributeText,
} from './providers/dry-run.js';
