import { homedir } from 'os';
import { relative, isAbsolute, sep } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Relative to cwd for paths inside it
 * - Tilde notation (~) for other paths under the home directory
 * - Absolute otherwise
 *
 * @example
 * formatPathForDisplay('/home/user/maps/out', '/home/user/maps') // => 'out'
 * formatPathForDisplay('/home/user/content', '/tmp') // => '~/content'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd(), home: string = homedir()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath === '') {
    return '.';
  }
  if (!relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  if (path === home) {
    return '~';
  }
  if (path.startsWith(home + sep)) {
    return `~${sep}${path.slice(home.length + 1)}`;
  }

  return path;
}
