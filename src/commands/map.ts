import { Command } from 'commander';
import pico from 'picocolors';
import { basename } from 'path';
import { CollectCommandOptions, CommandResult } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { addCollectOptions, runCollectContent } from '../cli/collect-content.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { OutputPort } from '../core/ports/output.js';
import { computeMapStats, type MapStats } from '../parsers/index.js';
import { isFile, readBinaryFile } from '../utils/fs.js';

const TOP_CLASSES_SHOWN = 10;

export function formatMapStats(stats: MapStats): string[] {
  const lines = [
    `Solids: ${stats.solids} (${stats.sides} sides)`,
    `Entities: ${stats.entities} (${stats.brushEntities} with brushes)`
  ];

  const classes = [...stats.entityClasses.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b));
  for (const [className, count] of classes.slice(0, TOP_CLASSES_SHOWN)) {
    lines.push(`  ${className.padEnd(32)}${count}`);
  }
  if (classes.length > TOP_CLASSES_SHOWN) {
    lines.push(pico.dim(`  ... ${classes.length - TOP_CLASSES_SHOWN} more classes`));
  }
  return lines;
}

async function mapStatsCommand(file: string, out: OutputPort): Promise<CommandResult<MapStats>> {
  if (!(await isFile(file))) {
    throw new ValidationError(`Map file not found: ${file}`);
  }
  const stats = computeMapStats(await readBinaryFile(file));
  out.note(formatMapStats(stats).join('\n'), basename(file));
  return { success: true, data: stats };
}

export function setupMapCommand(program: Command): void {
  const map = program
    .command('map')
    .description('work with map (.vmf) files');

  addCollectOptions(
    map
      .command('collect-content')
      .description('copy every material, texture and model the maps use into an output directory')
      .argument('<vmf...>', 'map files to collect content for')
  ).action(withErrorHandling(async (files: string[], options: CollectCommandOptions, command: Command) => {
    const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
    await runCollectContent('map', files, options, cwd);
  }));

  map
    .command('stats')
    .description('count solids, sides and entity classes of a map')
    .argument('<vmf>', 'map file')
    .action(withErrorHandling(async (file: string, _options: Record<string, never>, command: Command) => {
      const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
      const ctx = await createCliExecutionContext({ cwd });
      await mapStatsCommand(resolveFromContext(ctx, file), resolveOutput(ctx));
    }));
}
