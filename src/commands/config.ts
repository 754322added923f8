import { Command } from 'commander';
import { CommandResult } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { CONFIG_KEYS, configManager, isConfigKey, type ConfigKey } from '../core/config.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { formatPathForDisplay } from '../utils/formatters.js';

/**
 * `srcpack config`: persistent defaults for the collect commands
 */

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key '${key}'. Use one of: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

export function formatConfigValue(value: string | number | string[] | undefined): string {
  if (value === undefined) return '(not set)';
  if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : '(empty)';
  return String(value);
}

async function listConfig(out: OutputPort): Promise<CommandResult> {
  const lines: string[] = [];
  for (const key of CONFIG_KEYS) {
    lines.push(`${key.padEnd(14)}${formatConfigValue(await configManager.get(key))}`);
  }
  out.note(lines.join('\n'), formatPathForDisplay(await configManager.getConfigFilePath()));
  return { success: true, data: await configManager.getAll() };
}

async function withOutput(
  command: Command,
  fn: (out: OutputPort, ctx: ExecutionContext) => Promise<CommandResult>
): Promise<void> {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  const ctx = await createCliExecutionContext({ cwd });
  const result = await fn(resolveOutput(ctx), ctx);
  if (!result.success) {
    throw new Error(result.error || 'Config operation failed');
  }
}

export function setupConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description(`read and write persistent settings (${CONFIG_KEYS.join(', ')})`);

  config
    .command('get')
    .argument('<key>', 'setting name')
    .description('print a setting')
    .action(withErrorHandling(async (key: string, _options: Record<string, never>, command: Command) => {
      const configKey = parseKey(key);
      await withOutput(command, async out => {
        const value = await configManager.get(configKey);
        out.message(formatConfigValue(value));
        return { success: true, data: value };
      });
    }));

  config
    .command('set')
    .argument('<key>', 'setting name')
    .argument('<value>', 'new value (exclude takes a comma-separated list)')
    .description('change a setting')
    .action(withErrorHandling(async (key: string, value: string, _options: Record<string, never>, command: Command) => {
      const configKey = parseKey(key);
      await withOutput(command, async (out, ctx) => {
        await configManager.set(configKey, value, ctx.sourceCwd);
        out.success(`${configKey} = ${formatConfigValue(await configManager.get(configKey))}`);
        return { success: true };
      });
    }));

  config
    .command('unset')
    .argument('<key>', 'setting name')
    .description('remove a setting')
    .action(withErrorHandling(async (key: string, _options: Record<string, never>, command: Command) => {
      const configKey = parseKey(key);
      await withOutput(command, async out => {
        await configManager.unset(configKey);
        out.success(`${configKey} unset`);
        return { success: true };
      });
    }));

  config
    .command('list')
    .description('print every setting')
    .action(withErrorHandling(async (_options: Record<string, never>, command: Command) => {
      await withOutput(command, listConfig);
    }));
}
