/**
 * Source document parsers.
 *
 * The collection core depends on the SourceParsers interface only; the
 * default implementation decodes maps, materials and models from their
 * on-disk formats.
 */

import type { DiscoveredReference } from '../types/content.js';
import { extractMapReferences } from './vmf.js';
import { parseMaterial, type MaterialDocument } from './vmt.js';
import { extractModelReferences, type ModelReferences } from './mdl.js';

export type { MaterialDocument } from './vmt.js';
export type { ModelReferences } from './mdl.js';
export type { KeyValue } from './keyvalues.js';
export type { MapStats } from './vmf.js';
export { parseKeyValues, parseKeyValuesBytes, findValue, findBlock, findBlocks } from './keyvalues.js';
export { computeMapStats } from './vmf.js';

/**
 * Every method throws MalformedAssetError when the bytes cannot be decoded
 */
export interface SourceParsers {
  extractMapReferences(bytes: Uint8Array): DiscoveredReference[];
  parseMaterial(bytes: Uint8Array): MaterialDocument;
  extractModelReferences(bytes: Uint8Array): ModelReferences;
}

export const defaultParsers: SourceParsers = {
  extractMapReferences,
  parseMaterial,
  extractModelReferences
};
