/**
 * Case-insensitive file lookup under a directory.
 *
 * Asset names are case-insensitive but Linux file systems are not, so a
 * lookup walks the relative path one segment at a time, matching each
 * segment against the lowercased directory listing. Listings are read
 * once per directory and shared by concurrent lookups.
 */

import { join } from 'path';
import { listDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

interface CachedListing {
  files: Map<string, string>;
  directories: Map<string, string>;
}

export class CaseInsensitiveLocator {
  private readonly listings = new Map<string, Promise<CachedListing | null>>();

  /**
   * Find `relativePath` (normalized, lowercase) under `root`.
   * Returns the path as spelled on disk, relative to root, or null.
   */
  async locate(root: string, relativePath: string): Promise<string | null> {
    const segments = relativePath.split('/');
    const resolved: string[] = [];
    let directory = root;

    for (let i = 0; i < segments.length; i++) {
      const listing = await this.list(directory);
      if (!listing) {
        return null;
      }

      const isLast = i === segments.length - 1;
      const match = isLast
        ? listing.files.get(segments[i])
        : listing.directories.get(segments[i]);
      if (match === undefined) {
        return null;
      }

      resolved.push(match);
      directory = join(directory, match);
    }

    return resolved.join('/');
  }

  private list(directory: string): Promise<CachedListing | null> {
    let pending = this.listings.get(directory);
    if (!pending) {
      pending = readListing(directory);
      this.listings.set(directory, pending);
    }
    return pending;
  }
}

async function readListing(directory: string): Promise<CachedListing | null> {
  try {
    const listing = await listDirectory(directory);
    const cached: CachedListing = { files: new Map(), directories: new Map() };
    // First spelling wins when names differ only by case
    for (const name of [...listing.files].sort()) {
      const key = name.toLowerCase();
      if (!cached.files.has(key)) cached.files.set(key, name);
    }
    for (const name of [...listing.directories].sort()) {
      const key = name.toLowerCase();
      if (!cached.directories.has(key)) cached.directories.set(key, name);
    }
    return cached;
  } catch (error) {
    logger.debug(`Cannot list ${directory}`, { error });
    return null;
  }
}
