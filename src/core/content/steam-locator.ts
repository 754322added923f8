/**
 * Locates a Steam game's install directory from Steam's own manifests:
 * `steamapps/libraryfolders.vdf` lists the libraries and each library's
 * `steamapps/appmanifest_<appid>.acf` names the app's install directory.
 */

import { homedir } from 'os';
import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { findBlock, findValue, parseKeyValues, type KeyValue } from '../../parsers/keyvalues.js';

/**
 * Usual Steam client locations for the current platform
 */
export function defaultSteamRoots(platform: NodeJS.Platform = process.platform, home: string = homedir()): string[] {
  switch (platform) {
    case 'win32': {
      const programFiles = process.env['ProgramFiles(x86)'] ?? 'C:\\Program Files (x86)';
      return [join(programFiles, 'Steam')];
    }
    case 'darwin':
      return [join(home, 'Library', 'Application Support', 'Steam')];
    default:
      return [
        join(home, '.steam', 'steam'),
        join(home, '.local', 'share', 'Steam'),
        join(home, '.var', 'app', 'com.valvesoftware.Steam', '.local', 'share', 'Steam')
      ];
  }
}

/**
 * Library paths listed in libraryfolders.vdf. Both the current layout
 * (`"0" { "path" "..." }`) and the legacy one (`"1" "D:\\Games"`) are read.
 */
export function parseLibraryFolders(entries: KeyValue[]): string[] {
  const root = findBlock(entries, 'libraryfolders');
  if (!root) {
    return [];
  }

  const libraries: string[] = [];
  for (const entry of root) {
    if (!/^\d+$/.test(entry.key)) {
      continue;
    }
    if (typeof entry.value === 'string') {
      libraries.push(entry.value);
    } else {
      const path = findValue(entry.value, 'path');
      if (path) libraries.push(path);
    }
  }
  return libraries.map(path => path.replace(/\\\\/g, '\\'));
}

async function readKeyValuesFile(path: string): Promise<KeyValue[] | null> {
  if (!(await exists(path))) {
    return null;
  }
  try {
    return parseKeyValues(await readTextFile(path));
  } catch (error) {
    logger.debug(`Ignoring unreadable Steam manifest ${path}`, { error });
    return null;
  }
}

export async function locateSteamApp(appId: number, steamRoots: string[] = defaultSteamRoots()): Promise<string | null> {
  for (const steamRoot of steamRoots) {
    const steamApps = join(steamRoot, 'steamapps');
    if (!(await isDirectory(steamApps))) {
      continue;
    }

    const folders = await readKeyValuesFile(join(steamApps, FILE_PATTERNS.LIBRARY_FOLDERS));
    const libraries = [steamRoot, ...(folders ? parseLibraryFolders(folders) : [])];

    for (const library of libraries) {
      const manifest = await readKeyValuesFile(join(library, 'steamapps', `appmanifest_${appId}.acf`));
      const appState = manifest ? findBlock(manifest, 'AppState') : undefined;
      const installDir = appState ? findValue(appState, 'installdir') : undefined;
      if (!installDir) {
        continue;
      }

      const gameDir = join(library, 'steamapps', 'common', installDir);
      if (await isDirectory(gameDir)) {
        logger.debug(`Located Steam app ${appId} in ${gameDir}`);
        return gameDir;
      }
    }
  }

  return null;
}
