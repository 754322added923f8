/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Core logic uses this interface instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - ClackOutputAdapter (CLI, TTY): routes to @clack/prompts for rich terminal UI
 *   - Plain output (CLI, piped/CI): console with an optional animated spinner
 *   - consoleOutput (default fallback)
 *
 * Every implementation writes warnings and errors to stderr.
 */

/**
 * Spinner shown while a collection runs.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
}

/**
 * OutputPort defines all user-facing output operations.
 */
export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message (stderr) */
  error(message: string): void;

  /** Display a warning message (stderr) */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
