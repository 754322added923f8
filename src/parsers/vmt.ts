/**
 * Material (.vmt) document parser.
 *
 * A material is either a plain shader block or a `patch` block that
 * includes a base material and overrides some of its parameters through
 * `insert` and `replace` sub-blocks.
 */

import { MalformedAssetError } from '../utils/errors.js';
import { findBlock, findValue, parseKeyValuesBytes, type KeyValue } from './keyvalues.js';

export type MaterialDocument =
  | { kind: 'plain'; shader: string; properties: Map<string, string> }
  | { kind: 'patch'; include: string; overrides: Map<string, string> };

const PATCH_SHADER = 'patch';
const PATCH_OVERRIDE_BLOCKS = ['insert', 'replace'];

/**
 * Top-level string parameters, keys lowercased. Nested blocks (proxies,
 * shader fallbacks) are not parameters.
 */
function collectParameters(entries: KeyValue[], into: Map<string, string> = new Map()): Map<string, string> {
  for (const entry of entries) {
    if (typeof entry.value === 'string') {
      into.set(entry.key.toLowerCase(), entry.value);
    }
  }
  return into;
}

export function parseMaterial(bytes: Uint8Array): MaterialDocument {
  const entries = parseKeyValuesBytes(bytes);
  const root = entries[0];

  if (!root || typeof root.value === 'string') {
    throw new MalformedAssetError('Material has no shader block');
  }

  if (root.key.toLowerCase() !== PATCH_SHADER) {
    return { kind: 'plain', shader: root.key, properties: collectParameters(root.value) };
  }

  const include = findValue(root.value, 'include');
  if (!include) {
    throw new MalformedAssetError('Patch material has no "include" key');
  }

  const overrides = new Map<string, string>();
  for (const blockName of PATCH_OVERRIDE_BLOCKS) {
    const block = findBlock(root.value, blockName);
    if (block) {
      collectParameters(block, overrides);
    }
  }

  return { kind: 'patch', include, overrides };
}
