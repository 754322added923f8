/**
 * Execution Context Module
 *
 * Creates and validates ExecutionContext for commands.
 * sourceCwd is where relative command-line paths are resolved from.
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * sourceCwd = resolve(--cwd) when given, otherwise process.cwd()
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  if (!(await isDirectory(sourceCwd))) {
    throw new ValidationError(`Working directory '${sourceCwd}' does not exist or is not a directory`);
  }

  const context: ExecutionContext = { sourceCwd };

  logger.debug('Created execution context', { sourceCwd });

  return context;
}

/**
 * Resolve a command-line path against the context's working directory
 */
export function resolveFromContext(ctx: ExecutionContext, path: string): string {
  return resolve(ctx.sourceCwd, path);
}
