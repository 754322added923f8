/**
 * Port Resolution Helpers
 *
 * Resolves the OutputPort from an ExecutionContext, falling back to a
 * safe default when none was injected.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * Resolve the OutputPort from an ExecutionContext.
 * Falls back to consoleOutput if not provided.
 */
export function resolveOutput(ctx?: ExecutionContext | { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
