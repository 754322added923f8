/**
 * Directory index of a VPK archive (`*_dir.vpk`).
 *
 * Only the file tree is read; the collector never copies game content, so
 * it only needs to know whether a path is present.
 */

import { readBinaryFile } from '../../utils/fs.js';
import { MalformedAssetError } from '../../utils/errors.js';
import { normalizeAssetPath } from './asset-reference.js';

const VPK_SIGNATURE = 0x55aa1234;
const HEADER_SIZE_V1 = 12;
const HEADER_SIZE_V2 = 28;
const ENTRY_SIZE = 18;
const ENTRY_TERMINATOR = 0xffff;
/** Placeholder the tree uses for "no extension" and "root directory" */
const EMPTY_COMPONENT = ' ';

export class VpkIndex {
  private constructor(
    readonly archivePath: string,
    private readonly entries: ReadonlySet<string>
  ) {}

  get size(): number {
    return this.entries.size;
  }

  has(relativePath: string): boolean {
    return this.entries.has(normalizeAssetPath(relativePath));
  }

  static async load(archivePath: string): Promise<VpkIndex> {
    const buffer = await readBinaryFile(archivePath);
    return new VpkIndex(archivePath, readVpkTree(buffer));
  }

  static fromBuffer(archivePath: string, buffer: Buffer): VpkIndex {
    return new VpkIndex(archivePath, readVpkTree(buffer));
  }
}

/**
 * Walk the extension -> directory -> file name tree
 */
export function readVpkTree(buffer: Buffer): Set<string> {
  if (buffer.length < HEADER_SIZE_V1 || buffer.readUInt32LE(0) !== VPK_SIGNATURE) {
    throw new MalformedAssetError('Not a VPK directory file');
  }

  const version = buffer.readUInt32LE(4);
  let offset: number;
  if (version === 1) {
    offset = HEADER_SIZE_V1;
  } else if (version === 2) {
    offset = HEADER_SIZE_V2;
  } else {
    throw new MalformedAssetError(`Unsupported VPK version ${version}`);
  }

  const readString = (): string => {
    const end = buffer.indexOf(0, offset);
    if (end === -1) {
      throw new MalformedAssetError(`Unterminated VPK tree string at offset ${offset}`);
    }
    const value = buffer.toString('latin1', offset, end);
    offset = end + 1;
    return value;
  };

  const entries = new Set<string>();

  for (;;) {
    const extension = readString();
    if (extension === '') break;

    for (;;) {
      const directory = readString();
      if (directory === '') break;

      for (;;) {
        const name = readString();
        if (name === '') break;

        if (offset + ENTRY_SIZE > buffer.length) {
          throw new MalformedAssetError(`Truncated VPK entry for "${name}"`);
        }
        const preloadBytes = buffer.readUInt16LE(offset + 4);
        const terminator = buffer.readUInt16LE(offset + 16);
        if (terminator !== ENTRY_TERMINATOR) {
          throw new MalformedAssetError(`Bad VPK entry terminator for "${name}"`);
        }
        offset += ENTRY_SIZE + preloadBytes;

        const fileName = extension === EMPTY_COMPONENT ? name : `${name}.${extension}`;
        const fullPath = directory === EMPTY_COMPONENT ? fileName : `${directory}/${fileName}`;
        entries.add(normalizeAssetPath(fullPath));
      }
    }
  }

  return entries;
}
