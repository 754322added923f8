/**
 * Model (.mdl) header reader.
 *
 * Reads the studio header's texture table, `$cdmaterials` directories and
 * skin families. Only what the collector needs is decoded; geometry,
 * bones and animations are never touched.
 */

import { MalformedAssetError } from '../utils/errors.js';

export interface ModelReferences {
  /** Material names in skin order, relative to a `$cdmaterials` directory */
  materials: string[];
  /** `$cdmaterials` directories in search order */
  materialDirectories: string[];
}

const STUDIO_MAGIC = 'IDST';
const TEXTURE_STRUCT_SIZE = 64;

const HEADER = {
  VERSION: 4,
  NUM_TEXTURES: 204,
  TEXTURE_INDEX: 208,
  NUM_CD_TEXTURES: 212,
  CD_TEXTURE_INDEX: 216,
  NUM_SKIN_REF: 220,
  NUM_SKIN_FAMILIES: 224,
  SKIN_INDEX: 228,
  SIZE: 232
} as const;

class StudioReader {
  constructor(private readonly buffer: Buffer) {}

  int32(offset: number, field: string): number {
    this.ensure(offset, 4, field);
    return this.buffer.readInt32LE(offset);
  }

  int16(offset: number, field: string): number {
    this.ensure(offset, 2, field);
    return this.buffer.readInt16LE(offset);
  }

  string(offset: number, field: string): string {
    this.ensure(offset, 1, field);
    const end = this.buffer.indexOf(0, offset);
    if (end === -1) {
      throw new MalformedAssetError(`Unterminated ${field} string at offset ${offset}`);
    }
    return this.buffer.toString('latin1', offset, end);
  }

  count(offset: number, field: string): number {
    const value = this.int32(offset, field);
    if (value < 0) {
      throw new MalformedAssetError(`Negative ${field} (${value})`);
    }
    return value;
  }

  private ensure(offset: number, size: number, field: string): void {
    if (offset < 0 || offset + size > this.buffer.length) {
      throw new MalformedAssetError(`${field} at offset ${offset} lies outside the ${this.buffer.length}-byte model`);
    }
  }
}

export function extractModelReferences(bytes: Uint8Array): ModelReferences {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (buffer.length < HEADER.SIZE || buffer.toString('latin1', 0, 4) !== STUDIO_MAGIC) {
    throw new MalformedAssetError('Not a studio model (missing IDST header)');
  }

  const reader = new StudioReader(buffer);

  const numTextures = reader.count(HEADER.NUM_TEXTURES, 'texture count');
  const textureIndex = reader.int32(HEADER.TEXTURE_INDEX, 'texture index');
  const textures: string[] = [];
  for (let i = 0; i < numTextures; i++) {
    const structOffset = textureIndex + i * TEXTURE_STRUCT_SIZE;
    const nameOffset = structOffset + reader.int32(structOffset, `texture ${i}`);
    textures.push(reader.string(nameOffset, `texture ${i} name`));
  }

  const numCdTextures = reader.count(HEADER.NUM_CD_TEXTURES, '$cdmaterials count');
  const cdTextureIndex = reader.int32(HEADER.CD_TEXTURE_INDEX, '$cdmaterials index');
  const materialDirectories: string[] = [];
  for (let i = 0; i < numCdTextures; i++) {
    const stringOffset = reader.int32(cdTextureIndex + i * 4, `$cdmaterials ${i}`);
    materialDirectories.push(reader.string(stringOffset, `$cdmaterials ${i}`));
  }

  const numSkinRef = reader.count(HEADER.NUM_SKIN_REF, 'skin reference count');
  const numSkinFamilies = reader.count(HEADER.NUM_SKIN_FAMILIES, 'skin family count');
  const skinIndex = reader.int32(HEADER.SKIN_INDEX, 'skin index');

  // Skin families swap materials per skin; every texture they name is needed
  const used = new Set<number>();
  for (let family = 0; family < numSkinFamilies; family++) {
    for (let slot = 0; slot < numSkinRef; slot++) {
      const textureId = reader.int16(skinIndex + (family * numSkinRef + slot) * 2, `skin ${family} slot ${slot}`);
      if (textureId < 0 || textureId >= numTextures) {
        throw new MalformedAssetError(`Skin ${family} references texture ${textureId} of ${numTextures}`);
      }
      used.add(textureId);
    }
  }

  const materials = used.size > 0
    ? [...used].map(textureId => textures[textureId])
    : textures;

  return { materials, materialDirectories };
}
