import { Command } from 'commander';
import { CollectCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addCollectOptions, runCollectContent } from '../cli/collect-content.js';

export function setupModelCommand(program: Command): void {
  const model = program
    .command('model')
    .description('work with compiled model (.mdl) files');

  addCollectOptions(
    model
      .command('collect-content')
      .description('copy the model files and every material and texture they use into an output directory')
      .argument('<mdl...>', 'model files to collect content for')
  ).action(withErrorHandling(async (files: string[], options: CollectCommandOptions, command: Command) => {
    const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
    await runCollectContent('model', files, options, cwd);
  }));
}
