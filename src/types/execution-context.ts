/**
 * Execution Context Types
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 *
 * Carries the port used for user-facing output, so the same collection
 * logic can be driven by the CLI or by tests.
 */
export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   * Used for resolving input arguments (asset paths, source paths, output path).
   */
  sourceCwd: string;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Working directory override (--cwd) */
  cwd?: string;
}
