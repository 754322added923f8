import * as os from 'os';
import * as path from 'path';
import { SrcpackDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * srcpack keeps its settings under ~/.srcpack on every platform
 */
export function getSrcpackDirectories(homeDir: string = os.homedir()): SrcpackDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.SRCPACK)
  };
}

/**
 * Ensure the srcpack directories exist
 */
export async function ensureSrcpackDirectories(dirs: SrcpackDirectories = getSrcpackDirectories()): Promise<SrcpackDirectories> {
  try {
    await ensureDir(dirs.config);
    logger.debug('srcpack directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create srcpack directories', { error, directories: dirs });
    throw error;
  }
}
