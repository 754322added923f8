import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Version from the package.json two levels up (src/utils or dist/utils)
 */
export function getVersion(): string {
  const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { manifestPath, error });
  }
  return FALLBACK_VERSION;
}
