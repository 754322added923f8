import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, join } from 'path';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';
import { isJunk } from 'junk';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Throw unless the path is a directory the process can list
 */
export async function assertReadableDirectory(path: string): Promise<void> {
  if (!(await isDirectory(path))) {
    throw new FileSystemError(`Not a directory: ${path}`, { path });
  }
  try {
    await fs.access(path, fsConstants.R_OK | fsConstants.X_OK);
  } catch (error) {
    throw new FileSystemError(`Directory is not readable: ${path}`, { path, error });
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Create a directory (if needed) and make sure it can be written to
 */
export async function ensureWritableDir(path: string): Promise<void> {
  await ensureDir(path);
  try {
    await fs.access(path, fsConstants.W_OK);
  } catch (error) {
    throw new FileSystemError(`Directory is not writable: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as raw bytes
 */
export async function readBinaryFile(path: string): Promise<Buffer> {
  try {
    return await fs.readFile(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Directory entries, split into files and directories, without junk files
 */
export interface DirectoryListing {
  files: string[];
  directories: string[];
}

/**
 * List a directory (non-recursive). Symlinks are followed.
 */
export async function listDirectory(dirPath: string): Promise<DirectoryListing> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    const listing: DirectoryListing = { files: [], directories: [] };

    for (const entry of entries) {
      if (isJunk(entry.name)) {
        continue;
      }
      if (entry.isDirectory()) {
        listing.directories.push(entry.name);
      } else if (entry.isFile()) {
        listing.files.push(entry.name);
      } else if (entry.isSymbolicLink()) {
        try {
          const stats = await fs.stat(join(dirPath, entry.name));
          if (stats.isDirectory()) listing.directories.push(entry.name);
          else if (stats.isFile()) listing.files.push(entry.name);
        } catch {
          // Broken symlink
        }
      }
    }

    return listing;
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Write JSON with indentation (JSONC files are written the same way; comments are not preserved)
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, indent) + '\n');
}

/**
 * Read and parse a JSON or JSONC file
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });

  if (errors.length > 0 || result === undefined) {
    const reason = errors.length > 0
      ? `${printParseErrorCode(errors[0].error)} at offset ${errors[0].offset}`
      : 'empty document';
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path} (${reason})`, { path });
  }

  return result;
}
