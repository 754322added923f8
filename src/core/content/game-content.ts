/**
 * Game content root discovery.
 *
 * The host game's gameinfo.txt lists its search paths. Entries whose type
 * includes `game` are where the engine loads content from; together they
 * form the lowest-priority search root. A missing or malformed gameinfo
 * means no game fallback, never a failed run.
 */

import { basename, dirname, isAbsolute, join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory, listDirectory, readTextFile } from '../../utils/fs.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { findBlock, parseKeyValues, type KeyValue } from '../../parsers/keyvalues.js';
import { VpkIndex } from './vpk-index.js';
import { locateSteamApp } from './steam-locator.js';

const GAMEINFO_PATH_TOKEN = '|gameinfo_path|';
const ENGINE_PATHS_TOKEN = '|all_source_engine_paths|';
const GAME_SEARCH_TYPE = 'game';

export interface GameContentRoot {
  installDir: string;
  modDir: string;
  /** Loose content directories in search order */
  directories: string[];
  /** VPK archives in search order, consulted after the loose directories */
  archives: VpkIndex[];
}

export interface GameDiscoveryOptions {
  /** Install directory, or the mod directory itself (the one holding gameinfo.txt) */
  gameDir?: string;
  modDir: string;
  appId: number;
  steamRoots?: string[];
}

export interface GameDiscovery {
  content: GameContentRoot | null;
  /** Why there is no game fallback, when there is none */
  warning?: string;
}

export interface GameSearchPath {
  types: string[];
  path: string;
}

/**
 * SearchPaths entries of a parsed gameinfo.txt, in file order
 */
export function parseGameInfoSearchPaths(entries: KeyValue[]): GameSearchPath[] | null {
  const gameInfo = findBlock(entries, 'GameInfo');
  const fileSystem = gameInfo ? findBlock(gameInfo, 'FileSystem') : undefined;
  const searchPaths = fileSystem ? findBlock(fileSystem, 'SearchPaths') : undefined;
  if (!searchPaths) {
    return null;
  }

  const result: GameSearchPath[] = [];
  for (const entry of searchPaths) {
    if (typeof entry.value === 'string') {
      result.push({ types: entry.key.toLowerCase().split('+'), path: entry.value });
    }
  }
  return result;
}

/**
 * Expand the engine's path tokens. Plain relative paths are relative to the install directory.
 */
export function expandSearchPath(path: string, installDir: string, modPath: string): string {
  const lower = path.toLowerCase();
  if (lower.startsWith(GAMEINFO_PATH_TOKEN)) {
    return join(modPath, path.slice(GAMEINFO_PATH_TOKEN.length));
  }
  if (lower.startsWith(ENGINE_PATHS_TOKEN)) {
    return join(installDir, path.slice(ENGINE_PATHS_TOKEN.length));
  }
  return isAbsolute(path) ? path : join(installDir, path);
}

async function findGameInfo(gameDir: string, modDir: string): Promise<{ installDir: string; modPath: string } | null> {
  if (await exists(join(gameDir, FILE_PATTERNS.GAMEINFO))) {
    return { installDir: dirname(gameDir), modPath: gameDir };
  }
  const modPath = join(gameDir, modDir);
  if (await exists(join(modPath, FILE_PATTERNS.GAMEINFO))) {
    return { installDir: gameDir, modPath };
  }
  return null;
}

async function loadArchive(path: string): Promise<VpkIndex | null> {
  const directoryFile = path.slice(0, -FILE_PATTERNS.VPK.length) + FILE_PATTERNS.VPK_DIRECTORY_SUFFIX;
  if (!(await exists(directoryFile))) {
    logger.debug(`Game search path archive not found: ${directoryFile}`);
    return null;
  }
  try {
    const index = await VpkIndex.load(directoryFile);
    logger.debug(`Indexed ${index.size} files in ${directoryFile}`);
    return index;
  } catch (error) {
    logger.warn(`Skipping unreadable archive ${directoryFile}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Build the game content root from a gameinfo.txt
 */
export async function loadGameContent(installDir: string, modPath: string): Promise<GameDiscovery> {
  const gameInfoPath = join(modPath, FILE_PATTERNS.GAMEINFO);

  let searchPaths: GameSearchPath[] | null;
  try {
    searchPaths = parseGameInfoSearchPaths(parseKeyValues(await readTextFile(gameInfoPath)));
  } catch (error) {
    return { content: null, warning: `Could not read ${gameInfoPath}: ${errorMessage(error)}` };
  }
  if (!searchPaths) {
    return { content: null, warning: `${gameInfoPath} has no FileSystem/SearchPaths block` };
  }

  const content: GameContentRoot = { installDir, modDir: basename(modPath), directories: [], archives: [] };
  const seenDirectories = new Set<string>();
  const addDirectory = (directory: string): void => {
    if (!seenDirectories.has(directory)) {
      seenDirectories.add(directory);
      content.directories.push(directory);
    }
  };

  for (const searchPath of searchPaths) {
    if (!searchPath.types.includes(GAME_SEARCH_TYPE)) {
      continue;
    }

    const expanded = expandSearchPath(searchPath.path, installDir, modPath);

    if (expanded.toLowerCase().endsWith(FILE_PATTERNS.VPK)) {
      const archive = await loadArchive(expanded);
      if (archive) content.archives.push(archive);
    } else if (expanded.endsWith('*')) {
      const parent = expanded.replace(/[\\/]?\*$/, '');
      if (await isDirectory(parent)) {
        const listing = await listDirectory(parent);
        for (const child of listing.directories.sort()) {
          addDirectory(join(parent, child));
        }
      }
    } else if (await isDirectory(expanded)) {
      addDirectory(expanded);
    } else {
      logger.debug(`Game search path does not exist: ${expanded}`);
    }
  }

  return { content };
}

/**
 * Find the game install (explicit directory or Steam) and load its content root
 */
export async function discoverGameContent(options: GameDiscoveryOptions): Promise<GameDiscovery> {
  const gameDir = options.gameDir ?? await locateSteamApp(options.appId, options.steamRoots);
  if (!gameDir) {
    return { content: null, warning: `Could not locate the install of Steam app ${options.appId}; pass --game-dir to use game content` };
  }

  const located = await findGameInfo(gameDir, options.modDir);
  if (!located) {
    return { content: null, warning: `No ${FILE_PATTERNS.GAMEINFO} found in ${gameDir} or ${join(gameDir, options.modDir)}` };
  }

  return loadGameContent(located.installDir, located.modPath);
}
