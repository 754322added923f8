import { Command } from 'commander';
import { CollectCommandOptions, CommandResult, SrcpackConfig } from '../types/index.js';
import { GAME_DEFAULTS, ENV_VARS } from '../constants/index.js';
import { configManager } from '../core/config.js';
import { createCliExecutionContext } from './context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { collectContent, type RootKind } from '../core/content/collect-pipeline.js';
import { reportCollection } from '../core/content/content-report.js';
import type { GameDiscoveryOptions } from '../core/content/game-content.js';
import type { ExecutionContext } from '../types/index.js';
import { formatPathForDisplay } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';

function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Options shared by `map collect-content` and `model collect-content`
 */
export function addCollectOptions(command: Command): Command {
  return command
    .option('-s, --source-path <dir>', 'content root to search, highest priority first (repeatable)', collectValues)
    .requiredOption('-o, --output-path <dir>', 'directory to copy the collected files into')
    .option('--game-dir <dir>', 'game install directory (default: config game.dir, $SRCPACK_GAME_DIR, then Steam)')
    .option('--mod-dir <name>', `mod directory inside the game install (default: ${GAME_DEFAULTS.MOD_DIR})`)
    .option('--no-game', 'do not fall back to the game\'s own content')
    .option('--exclude <glob...>', 'skip assets whose path matches a glob, e.g. "materials/dev/**"')
    .option('--dry-run', 'report what would be copied without copying');
}

/**
 * Game lookup: --game-dir, config game.dir, $SRCPACK_GAME_DIR, then Steam
 */
export function resolveGameOptions(
  options: CollectCommandOptions,
  config: SrcpackConfig,
  ctx: ExecutionContext,
  env: NodeJS.ProcessEnv = process.env
): GameDiscoveryOptions | null {
  if (options.game === false) {
    return null;
  }

  const gameDir = options.gameDir ?? config.game?.dir ?? env[ENV_VARS.GAME_DIR];
  return {
    gameDir: gameDir ? resolveFromContext(ctx, gameDir) : undefined,
    modDir: options.modDir ?? config.game?.modDir ?? GAME_DEFAULTS.MOD_DIR,
    appId: config.game?.appId ?? GAME_DEFAULTS.APP_ID
  };
}

export async function runCollectContent(
  kind: RootKind,
  files: string[],
  options: CollectCommandOptions,
  cwd?: string
): Promise<CommandResult<{ copied: number; missing: number }>> {
  const ctx = await createCliExecutionContext({ cwd });
  const out = resolveOutput(ctx);
  const config = await configManager.load();

  const outputDir = resolveFromContext(ctx, options.outputPath);
  const sourceRoots = (options.sourcePath ?? []).map(dir => resolveFromContext(ctx, dir));
  const exclude = [...(config.exclude ?? []), ...(options.exclude ?? [])];

  if (sourceRoots.length === 0) {
    out.warn('No --source-path given; only the root files themselves and game content will be searched');
  }
  logger.debug('Collect content', { kind, files, sourceRoots, outputDir, exclude });

  const spinner = out.spinner();
  spinner.start(`Collecting content for ${files.length} ${kind}${files.length === 1 ? '' : 's'}`);
  const result = await collectContent({
    rootKind: kind,
    rootFiles: files.map(file => resolveFromContext(ctx, file)),
    sourceRoots,
    outputDir,
    game: resolveGameOptions(options, config, ctx),
    exclude,
    dryRun: options.dryRun
  }).finally(() => spinner.stop());

  if (result.gameWarning) {
    out.warn(result.gameWarning);
  }

  reportCollection(out, result.manifest, {
    copied: result.copy.copied,
    planned: result.copy.planned.length,
    dryRun: options.dryRun === true,
    outputDir: formatPathForDisplay(outputDir, ctx.sourceCwd)
  });

  const missing = [...result.manifest.entries.values()].filter(entry => entry.result.status === 'missing').length;
  return { success: true, data: { copied: result.copy.copied, missing } };
}
