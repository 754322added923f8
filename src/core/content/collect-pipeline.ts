/**
 * Collect pipeline: validation, game discovery, extraction, the walk and the copy.
 *
 * Fatal conditions (a missing root file, a source root that cannot be
 * listed, an output directory that cannot be written) reject before the
 * walk starts. Everything else ends up in the manifest's diagnostics.
 */

import { basename, isAbsolute, relative, sep } from 'path';
import { DIR_PATTERNS } from '../../constants/index.js';
import { defaultParsers, type SourceParsers } from '../../parsers/index.js';
import type { CollectionManifest, Diagnostic, DiscoveredReference } from '../../types/content.js';
import { ValidationError, errorMessage } from '../../utils/errors.js';
import { assertReadableDirectory, ensureWritableDir, isFile, readBinaryFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { modelReference, normalizeAssetPath } from './asset-reference.js';
import { walkCollection } from './collection-walker.js';
import { collectFiles, type CollectResult } from './collector.js';
import { discoverGameContent, type GameContentRoot, type GameDiscoveryOptions } from './game-content.js';
import { SearchPathIndex } from './search-path-index.js';

export type RootKind = 'map' | 'model';

export interface CollectContentOptions {
  rootKind: RootKind;
  /** Absolute paths of the maps or models to collect for */
  rootFiles: string[];
  /** Absolute source root directories, highest priority first */
  sourceRoots: string[];
  outputDir: string;
  /** null disables the game content fallback */
  game: GameDiscoveryOptions | null;
  exclude?: string[];
  dryRun?: boolean;
  parsers?: SourceParsers;
}

export interface CollectContentResult {
  manifest: CollectionManifest;
  copy: CollectResult;
  searchRoots: string[];
  gameWarning?: string;
}

interface Seeds {
  references: DiscoveredReference[];
  diagnostics: Diagnostic[];
  /** Content roots of root models that live outside every source root */
  extraRoots: string[];
}

const COMMAND_LINE_REFERRER = 'command line';

/**
 * Content-relative path of a model given on the command line, and the
 * content root it lives under
 */
export function locateRootModel(file: string, sourceRoots: readonly string[]): { root: string; relativePath: string } {
  for (const root of sourceRoots) {
    const rel = relative(root, file);
    if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
      return { root, relativePath: normalizeAssetPath(rel) };
    }
  }

  const segments = file.split(sep);
  const modelsIndex = segments.map(segment => segment.toLowerCase()).lastIndexOf(DIR_PATTERNS.MODELS);
  if (modelsIndex > 0) {
    return {
      root: segments.slice(0, modelsIndex).join(sep) || sep,
      relativePath: normalizeAssetPath(segments.slice(modelsIndex).join('/'))
    };
  }

  throw new ValidationError(
    `Cannot tell where ${file} sits in a content tree; move it under a "${DIR_PATTERNS.MODELS}" directory or pass its content root with --source-path`
  );
}

async function extractSeeds(options: CollectContentOptions, parsers: SourceParsers): Promise<Seeds> {
  const seeds: Seeds = { references: [], diagnostics: [], extraRoots: [] };

  for (const file of options.rootFiles) {
    if (options.rootKind === 'model') {
      const located = locateRootModel(file, options.sourceRoots);
      if (!options.sourceRoots.includes(located.root) && !seeds.extraRoots.includes(located.root)) {
        seeds.extraRoots.push(located.root);
      }
      seeds.references.push({ reference: modelReference(located.relativePath), referrer: COMMAND_LINE_REFERRER });
      continue;
    }

    const name = basename(file);
    try {
      const references = parsers.extractMapReferences(await readBinaryFile(file));
      logger.debug(`Extracted ${references.length} references from ${name}`);
      for (const { reference, referrer } of references) {
        seeds.references.push({ reference, referrer: `${name}: ${referrer}` });
      }
    } catch (error) {
      seeds.diagnostics.push({ kind: 'malformed-asset', asset: name, message: `malformed map: ${errorMessage(error)}` });
    }
  }

  return seeds;
}

export async function collectContent(options: CollectContentOptions): Promise<CollectContentResult> {
  const parsers = options.parsers ?? defaultParsers;

  if (options.rootFiles.length === 0) {
    throw new ValidationError(`No ${options.rootKind} files given`);
  }
  for (const file of options.rootFiles) {
    if (!(await isFile(file))) {
      throw new ValidationError(`${options.rootKind === 'map' ? 'Map' : 'Model'} file not found: ${file}`);
    }
  }
  for (const root of options.sourceRoots) {
    await assertReadableDirectory(root);
  }
  if (!options.dryRun) {
    await ensureWritableDir(options.outputDir);
  }

  let gameWarning: string | undefined;
  let gameContent: GameContentRoot | null = null;
  if (options.game) {
    const discovery = await discoverGameContent(options.game);
    gameContent = discovery.content;
    gameWarning = discovery.warning;
    if (gameContent) {
      logger.debug('Game content root', {
        installDir: gameContent.installDir,
        directories: gameContent.directories,
        archives: gameContent.archives.map(archive => archive.archivePath)
      });
    }
  }

  const seeds = await extractSeeds(options, parsers);
  const searchRoots = [...options.sourceRoots, ...seeds.extraRoots];
  const index = new SearchPathIndex(searchRoots, gameContent);

  const walked = await walkCollection(seeds.references, { index, parsers, exclude: options.exclude });
  const manifest: CollectionManifest = {
    entries: walked.entries,
    diagnostics: [...seeds.diagnostics, ...walked.diagnostics]
  };

  const copy = await collectFiles(manifest, options.outputDir, { dryRun: options.dryRun });

  return { manifest, copy, searchRoots, gameWarning };
}

