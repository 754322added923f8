/**
 * Content collection types: asset references, resolution outcomes and the
 * collection manifest.
 */

/**
 * Textures resolve like materials but are never parsed.
 */
export type AssetKind = 'material' | 'texture' | 'model';

/**
 * A referenced asset. `path` is normalized (lowercase, forward slashes,
 * relative to a content root, extension included).
 */
export interface AssetReference {
  kind: AssetKind;
  path: string;
}

/**
 * A reference as produced by an extractor, with a description of what
 * referenced it (shown next to missing assets).
 */
export interface DiscoveredReference {
  reference: AssetReference;
  referrer: string;
}

/**
 * A directory consulted when resolving a relative asset path.
 * Priority 0 is consulted first.
 */
export interface SearchRoot {
  priority: number;
  directory: string;
}

export type ResolutionResult =
  | { status: 'found'; root: SearchRoot; absolutePath: string; relativePath: string }
  | { status: 'found-in-game'; absolutePath: string; archive?: string }
  | { status: 'missing' };

export type DiagnosticKind =
  | 'missing-asset'
  | 'missing-optional-file'
  | 'circular-patch-reference'
  | 'malformed-asset';

export interface Diagnostic {
  kind: DiagnosticKind;
  /** Normalized path of the asset the diagnostic is about */
  asset: string;
  message: string;
}

/**
 * A model sibling file (`.phy`, `.vvd`, ...) resolved alongside the `.mdl`
 */
export interface CompanionFile {
  suffix: string;
  path: string;
  result: ResolutionResult;
}

export interface ManifestEntry {
  reference: AssetReference;
  result: ResolutionResult;
  companions: CompanionFile[];
  referrers: string[];
}

/**
 * Final state of a collection walk, consumed by the collector and the report
 */
export interface CollectionManifest {
  entries: ReadonlyMap<string, ManifestEntry>;
  diagnostics: readonly Diagnostic[];
}
