/**
 * Collector (copy stage)
 *
 * Only files found under a user source root are copied. Game content is
 * assumed installed already, missing files have nothing to copy.
 */

import { join, posix } from 'path';
import { IO_CONCURRENCY } from '../../constants/index.js';
import type { CollectionManifest, ResolutionResult } from '../../types/content.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { copyFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface PlannedCopy {
  source: string;
  destination: string;
  /** Path under the output directory: lowercased directories, file name as spelled on disk */
  relativePath: string;
}

export interface CollectOptions {
  dryRun?: boolean;
  /** Files copied at once */
  concurrency?: number;
}

export interface CollectResult {
  planned: PlannedCopy[];
  copied: number;
}

/**
 * Output path for a file found at `relativePath` under a source root.
 * Directories are lowercased so that `Materials/Brick` and `materials/brick`
 * from two roots land in one tree.
 */
export function outputRelativePath(relativePath: string): string {
  const normalized = relativePath.replace(/\\/g, '/');
  const directory = posix.dirname(normalized);
  const file = posix.basename(normalized);
  return directory === '.' ? file : `${directory.toLowerCase()}/${file}`;
}

/**
 * Copies for every found entry and found model companion, one per destination
 */
export function planCopies(manifest: CollectionManifest, outputDir: string): PlannedCopy[] {
  const planned = new Map<string, PlannedCopy>();

  const add = (result: ResolutionResult): void => {
    if (result.status !== 'found') return;
    const relativePath = outputRelativePath(result.relativePath);
    const key = relativePath.toLowerCase();
    if (!planned.has(key)) {
      planned.set(key, { source: result.absolutePath, destination: join(outputDir, relativePath), relativePath });
    }
  };

  for (const entry of manifest.entries.values()) {
    add(entry.result);
    for (const companion of entry.companions) {
      add(companion.result);
    }
  }

  return [...planned.values()];
}

/**
 * Copy the planned files. A copy failure is fatal and rejects with FileSystemError.
 */
export async function collectFiles(
  manifest: CollectionManifest,
  outputDir: string,
  options: CollectOptions = {}
): Promise<CollectResult> {
  const planned = planCopies(manifest, outputDir);

  if (options.dryRun) {
    logger.debug(`Dry run: ${planned.length} files would be copied to ${outputDir}`);
    return { planned, copied: 0 };
  }

  await runWithConcurrency(
    planned.map(copy => () => copyFile(copy.source, copy.destination)),
    options.concurrency ?? IO_CONCURRENCY
  );
  return { planned, copied: planned.length };
}
