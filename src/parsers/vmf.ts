/**
 * Map (.vmf) reference extractor.
 *
 * Brush faces name materials; entities name materials through their
 * "material"/"texture" keyvalues and models through "model". Sprite
 * entities use "model" for a sprite material. Brush entities carry
 * "model" values like "*3" that point into the compiled map and are skipped.
 */

import { SPRITE_ENTITY_CLASSES, FILE_PATTERNS } from '../constants/index.js';
import type { DiscoveredReference } from '../types/content.js';
import { materialReference, modelReference } from '../core/content/asset-reference.js';
import { MalformedAssetError } from '../utils/errors.js';
import { findBlock, findBlocks, findValue, parseKeyValuesBytes, type KeyValue } from './keyvalues.js';

export interface MapStats {
  solids: number;
  sides: number;
  entities: number;
  brushEntities: number;
  entityClasses: Map<string, number>;
}

interface ParsedMap {
  world: KeyValue[];
  entities: KeyValue[][];
}

function readMap(bytes: Uint8Array): ParsedMap {
  const entries = parseKeyValuesBytes(bytes);
  const world = findBlock(entries, 'world');
  if (!world) {
    throw new MalformedAssetError('Map has no "world" block');
  }
  return { world, entities: findBlocks(entries, 'entity') };
}

function solidMaterials(
  owner: KeyValue[],
  describe: (solidId: string) => string,
  into: DiscoveredReference[]
): void {
  for (const solid of findBlocks(owner, 'solid')) {
    const solidId = findValue(solid, 'id') ?? '?';
    for (const side of findBlocks(solid, 'side')) {
      const material = findValue(side, 'material');
      if (material) {
        into.push({ reference: materialReference(material), referrer: describe(solidId) });
      }
    }
  }
}

export function extractMapReferences(bytes: Uint8Array): DiscoveredReference[] {
  const map = readMap(bytes);
  const references: DiscoveredReference[] = [];

  solidMaterials(map.world, solidId => `world brush ${solidId}`, references);

  for (const entity of map.entities) {
    const id = findValue(entity, 'id') ?? '?';
    const className = findValue(entity, 'classname') ?? 'unknown';
    const label = `entity ${id} (${className})`;

    solidMaterials(entity, solidId => `brush ${solidId} in ${label}`, references);

    for (const key of ['material', 'texture']) {
      const value = findValue(entity, key);
      if (value) {
        references.push({ reference: materialReference(value), referrer: `${label} "${key}" keyvalue` });
      }
    }

    const model = findValue(entity, 'model');
    if (!model || model.startsWith('*')) {
      continue;
    }

    if (SPRITE_ENTITY_CLASSES.includes(className.toLowerCase())) {
      references.push({ reference: materialReference(model.replace(/\.spr$/i, '')), referrer: `sprite of ${label}` });
    } else if (model.toLowerCase().endsWith(FILE_PATTERNS.MDL)) {
      references.push({ reference: modelReference(model), referrer: label });
    }
  }

  return references;
}

export function computeMapStats(bytes: Uint8Array): MapStats {
  const map = readMap(bytes);
  const stats: MapStats = { solids: 0, sides: 0, entities: 0, brushEntities: 0, entityClasses: new Map() };

  const countSolids = (owner: KeyValue[]): number => {
    const solids = findBlocks(owner, 'solid');
    stats.solids += solids.length;
    for (const solid of solids) {
      stats.sides += findBlocks(solid, 'side').length;
    }
    return solids.length;
  };

  countSolids(map.world);

  for (const entity of map.entities) {
    stats.entities++;
    if (countSolids(entity) > 0) {
      stats.brushEntities++;
    }
    const className = findValue(entity, 'classname') ?? 'unknown';
    stats.entityClasses.set(className, (stats.entityClasses.get(className) ?? 0) + 1);
  }

  return stats;
}
