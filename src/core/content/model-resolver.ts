/**
 * Model Resolver
 *
 * A model is its `.mdl` plus the sibling files that share its base name.
 * Only the `.mdl` is required. Its texture table names materials relative
 * to the `$cdmaterials` directories, which the engine tries in order.
 */

import { MODEL_SUFFIXES } from '../../constants/index.js';
import type { ModelReferences, SourceParsers } from '../../parsers/index.js';
import type {
  AssetReference,
  CompanionFile,
  Diagnostic,
  DiscoveredReference,
  ResolutionResult
} from '../../types/content.js';
import { errorMessage } from '../../utils/errors.js';
import { readBinaryFile } from '../../utils/fs.js';
import { materialReference, modelBasePath } from './asset-reference.js';
import type { SearchPathIndex } from './search-path-index.js';

export interface ModelResolution {
  result: ResolutionResult;
  companions: CompanionFile[];
  dependencies: DiscoveredReference[];
  diagnostics: Diagnostic[];
}

export class ModelResolver {
  constructor(
    private readonly index: SearchPathIndex,
    private readonly parsers: SourceParsers
  ) {}

  async resolve(reference: AssetReference): Promise<ModelResolution> {
    const result = await this.index.resolve(reference.path);
    if (result.status !== 'found') {
      return { result, companions: [], dependencies: [], diagnostics: [] };
    }

    let contents: ModelReferences;
    try {
      contents = this.parsers.extractModelReferences(await readBinaryFile(result.absolutePath));
    } catch (error) {
      return {
        result: { status: 'missing' },
        companions: [],
        dependencies: [],
        diagnostics: [{
          kind: 'malformed-asset',
          asset: reference.path,
          message: `malformed model: ${errorMessage(error)}`
        }]
      };
    }

    const base = modelBasePath(reference);
    const diagnostics: Diagnostic[] = [];
    const companions = await Promise.all(
      MODEL_SUFFIXES.OPTIONAL.map(async (suffix): Promise<CompanionFile> => {
        const path = `${base}${suffix}`;
        return { suffix, path, result: await this.index.resolve(path) };
      })
    );
    for (const companion of companions) {
      if (companion.result.status === 'missing') {
        diagnostics.push({
          kind: 'missing-optional-file',
          asset: reference.path,
          message: `missing optional file: ${companion.suffix}`
        });
      }
    }

    const referrer = `model ${reference.path}`;
    const dependencies: DiscoveredReference[] = [];
    const seen = new Set<string>();
    for (const name of contents.materials) {
      const material = await this.pickMaterial(name, contents.materialDirectories);
      if (!seen.has(material.path)) {
        seen.add(material.path);
        dependencies.push({ reference: material, referrer });
      }
    }

    return { result, companions, dependencies, diagnostics };
  }

  /**
   * First `$cdmaterials` candidate that resolves anywhere, else the first candidate
   */
  private async pickMaterial(name: string, directories: readonly string[]): Promise<AssetReference> {
    const candidates = directories.length > 0
      ? directories.map(directory => materialReference(`${directory}/${name}`))
      : [materialReference(name)];

    for (const candidate of candidates) {
      const result = await this.index.resolve(candidate.path);
      if (result.status !== 'missing') {
        return candidate;
      }
    }
    return candidates[0];
  }
}
