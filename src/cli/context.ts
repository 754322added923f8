/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI output adapter injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with the CLI output port injected.
 *
 * In interactive mode (TTY): uses Clack for output.
 * In non-interactive mode (CI/piped): uses plain console output.
 */
export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.output = getCliOutput(detectInteractive());

  return ctx;
}
