/**
 * Asset reference construction and normalization.
 *
 * Every path that enters the manifest goes through normalizeAssetPath, so
 * `Materials\Metal\Crate.vmt` and `materials/metal/crate.vmt` share one
 * identity.
 */

import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import type { AssetKind, AssetReference } from '../../types/content.js';

/**
 * Lowercase, forward slashes, no leading `./` or `/`, no empty or `.` segments
 */
export function normalizeAssetPath(path: string): string {
  return path
    .replace(/\\/g, '/')
    .toLowerCase()
    .split('/')
    .filter(segment => segment.length > 0 && segment !== '.')
    .join('/');
}

/**
 * Identity of a reference, used as the manifest key
 */
export function referenceKey(reference: AssetReference): string {
  return `${reference.kind}:${reference.path}`;
}

export function createReference(kind: AssetKind, path: string): AssetReference {
  return { kind, path: normalizeAssetPath(path) };
}

function withExtension(path: string, extension: string): string {
  return path.endsWith(extension) ? path : `${path}${extension}`;
}

function underDirectory(path: string, directory: string): string {
  return path.startsWith(`${directory}/`) ? path : `${directory}/${path}`;
}

/**
 * Material name as written in maps and models (`metal/crate`) or a full
 * path (`materials/metal/crate.vmt`)
 */
export function materialReference(name: string): AssetReference {
  const path = normalizeAssetPath(name);
  return { kind: 'material', path: withExtension(underDirectory(path, DIR_PATTERNS.MATERIALS), FILE_PATTERNS.VMT) };
}

/**
 * Texture name as written in a material parameter (`metal/crate`)
 */
export function textureReference(name: string): AssetReference {
  const path = normalizeAssetPath(name);
  return { kind: 'texture', path: withExtension(underDirectory(path, DIR_PATTERNS.MATERIALS), FILE_PATTERNS.VTF) };
}

/**
 * Model path as written in an entity (`models/props/crate.mdl`)
 */
export function modelReference(name: string): AssetReference {
  const path = normalizeAssetPath(name);
  return { kind: 'model', path: withExtension(underDirectory(path, DIR_PATTERNS.MODELS), FILE_PATTERNS.MDL) };
}

/**
 * `models/props/crate.mdl` -> `models/props/crate`
 */
export function modelBasePath(reference: AssetReference): string {
  return reference.path.endsWith(FILE_PATTERNS.MDL)
    ? reference.path.slice(0, -FILE_PATTERNS.MDL.length)
    : reference.path;
}
