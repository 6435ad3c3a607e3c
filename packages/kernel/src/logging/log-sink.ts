/**
 * Mantle Kernel — Log Sink Interface
 *
 * Defines the injection point for compile log persistence.
 *
 * The kernel owns the contract (this interface) and the CompileLogger class.
 * Concrete implementations live in the runtime host layer and are injected
 * at construction time; the kernel never writes to disk.
 */

import type { CompileLog } from '../types/compile-log.js';

/**
 * A sink that receives and persists compile log entries.
 *
 * append() must complete before check() returns. Implementations must not
 * silently discard entries.
 */
export interface LogSink {
  append(entry: CompileLog): void;
}
