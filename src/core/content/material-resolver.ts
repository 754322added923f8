/**
 * Material Resolver
 *
 * Resolves a material, follows its patch chain to compute the effective
 * parameter set, and turns the texture-slot parameters into texture
 * references for the walker. Materials that only exist in the game are
 * not inspected: whatever they need ships with the game too.
 */

import {
  ENGINE_GENERATED_TEXTURES,
  MATERIAL_MATERIAL_PARAMETERS,
  MATERIAL_TEXTURE_PARAMETERS
} from '../../constants/index.js';
import type { MaterialDocument, SourceParsers } from '../../parsers/index.js';
import type { AssetReference, Diagnostic, DiscoveredReference, ResolutionResult } from '../../types/content.js';
import { errorMessage } from '../../utils/errors.js';
import { readBinaryFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { materialReference, textureReference } from './asset-reference.js';
import type { SearchPathIndex } from './search-path-index.js';

export interface MaterialResolution {
  result: ResolutionResult;
  dependencies: DiscoveredReference[];
  diagnostics: Diagnostic[];
}

export class MaterialResolver {
  private readonly documents = new Map<string, Promise<MaterialDocument>>();
  private readonly reportedCycles = new Set<string>();

  constructor(
    private readonly index: SearchPathIndex,
    private readonly parsers: SourceParsers
  ) {}

  async resolve(reference: AssetReference): Promise<MaterialResolution> {
    const result = await this.index.resolve(reference.path);
    if (result.status !== 'found') {
      return { result, dependencies: [], diagnostics: [] };
    }

    let document: MaterialDocument;
    try {
      document = await this.load(result.absolutePath);
    } catch (error) {
      return {
        result: { status: 'missing' },
        dependencies: [],
        diagnostics: [{
          kind: 'malformed-asset',
          asset: reference.path,
          message: `malformed material: ${errorMessage(error)}`
        }]
      };
    }

    const diagnostics: Diagnostic[] = [];
    const dependencies: DiscoveredReference[] = [];
    let properties: Map<string, string>;

    if (document.kind === 'plain') {
      properties = document.properties;
    } else {
      const base = materialReference(document.include);
      dependencies.push({ reference: base, referrer: `patch material ${reference.path}` });
      const inherited = await this.effectiveProperties(base.path, [reference.path], diagnostics);
      properties = new Map([...(inherited ?? []), ...document.overrides]);
    }

    dependencies.push(...parameterReferences(reference.path, properties));
    return { result, dependencies, diagnostics };
  }

  /**
   * Effective parameters of the material at `path`, or null when its
   * chain cannot be followed (missing, game-only, unreadable or circular).
   */
  private async effectiveProperties(
    path: string,
    ancestors: string[],
    diagnostics: Diagnostic[]
  ): Promise<Map<string, string> | null> {
    const cycleStart = ancestors.indexOf(path);
    if (cycleStart !== -1) {
      this.reportCycle(ancestors.slice(cycleStart), diagnostics);
      return null;
    }

    const result = await this.index.resolve(path);
    if (result.status !== 'found') {
      return null;
    }

    let document: MaterialDocument;
    try {
      document = await this.load(result.absolutePath);
    } catch (error) {
      // Reported when the base itself is resolved as a dependency
      logger.debug(`Cannot inherit from ${path}: ${errorMessage(error)}`);
      return null;
    }

    if (document.kind === 'plain') {
      return document.properties;
    }

    const inherited = await this.effectiveProperties(
      materialReference(document.include).path,
      [...ancestors, path],
      diagnostics
    );
    return new Map([...(inherited ?? []), ...document.overrides]);
  }

  private reportCycle(members: string[], diagnostics: Diagnostic[]): void {
    const key = [...members].sort().join('|');
    if (this.reportedCycles.has(key)) {
      return;
    }
    this.reportedCycles.add(key);
    diagnostics.push({
      kind: 'circular-patch-reference',
      asset: members[0],
      message: `circular patch reference: ${[...members, members[0]].join(' -> ')}`
    });
  }

  private load(absolutePath: string): Promise<MaterialDocument> {
    let pending = this.documents.get(absolutePath);
    if (!pending) {
      pending = readBinaryFile(absolutePath).then(bytes => this.parsers.parseMaterial(bytes));
      this.documents.set(absolutePath, pending);
    }
    return pending;
  }
}

/**
 * Texture and material references named by a parameter set
 */
export function parameterReferences(materialPath: string, properties: ReadonlyMap<string, string>): DiscoveredReference[] {
  const references: DiscoveredReference[] = [];

  for (const parameter of MATERIAL_TEXTURE_PARAMETERS) {
    const value = properties.get(parameter);
    if (!value) continue;
    const reference = textureReference(value);
    if (ENGINE_GENERATED_TEXTURES.includes(reference.path)) continue;
    references.push({ reference, referrer: `material ${materialPath} (${parameter})` });
  }

  for (const parameter of MATERIAL_MATERIAL_PARAMETERS) {
    const value = properties.get(parameter);
    if (value) {
      references.push({ reference: materialReference(value), referrer: `material ${materialPath} (${parameter})` });
    }
  }

  return references;
}
