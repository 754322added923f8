/**
 * Search Path Index
 *
 * Answers "where does this relative path live?" across the user's source
 * roots (first supplied wins) and, only after all of them report absence,
 * the game's content root. Each unique path is resolved once per
 * invocation; concurrent callers share the pending lookup.
 */

import { join } from 'path';
import type { ResolutionResult, SearchRoot } from '../../types/content.js';
import { logger } from '../../utils/logger.js';
import { normalizeAssetPath } from './asset-reference.js';
import { CaseInsensitiveLocator } from './case-insensitive-locator.js';
import type { GameContentRoot } from './game-content.js';

export class SearchPathIndex {
  readonly roots: readonly SearchRoot[];
  private readonly locator = new CaseInsensitiveLocator();
  private readonly resolved = new Map<string, Promise<ResolutionResult>>();

  constructor(
    directories: readonly string[],
    private readonly gameContent: GameContentRoot | null = null
  ) {
    this.roots = directories.map((directory, priority) => ({ priority, directory }));
  }

  get hasGameContent(): boolean {
    return this.gameContent !== null;
  }

  resolve(relativePath: string): Promise<ResolutionResult> {
    const normalized = normalizeAssetPath(relativePath);
    let pending = this.resolved.get(normalized);
    if (!pending) {
      pending = this.lookup(normalized);
      this.resolved.set(normalized, pending);
    }
    return pending;
  }

  private async lookup(path: string): Promise<ResolutionResult> {
    for (const root of this.roots) {
      const onDisk = await this.locator.locate(root.directory, path);
      if (onDisk !== null) {
        logger.debug(`Resolved ${path} in source root ${root.priority}`, { root: root.directory });
        return { status: 'found', root, absolutePath: join(root.directory, onDisk), relativePath: onDisk };
      }
    }

    if (this.gameContent) {
      for (const directory of this.gameContent.directories) {
        const onDisk = await this.locator.locate(directory, path);
        if (onDisk !== null) {
          return { status: 'found-in-game', absolutePath: join(directory, onDisk) };
        }
      }
      for (const archive of this.gameContent.archives) {
        if (archive.has(path)) {
          return { status: 'found-in-game', absolutePath: path, archive: archive.archivePath };
        }
      }
    }

    return { status: 'missing' };
  }
}
