import { minimatch } from 'minimatch';
import { IO_CONCURRENCY } from '../../constants/index.js';
import { defaultParsers, type SourceParsers } from '../../parsers/index.js';
import type {
  AssetReference,
  CollectionManifest,
  CompanionFile,
  Diagnostic,
  DiscoveredReference,
  ManifestEntry,
  ResolutionResult
} from '../../types/content.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { logger } from '../../utils/logger.js';
import { referenceKey } from './asset-reference.js';
import { MaterialResolver } from './material-resolver.js';
import { ModelResolver } from './model-resolver.js';
import type { SearchPathIndex } from './search-path-index.js';

export interface CollectionWalkOptions {
  index: SearchPathIndex;
  parsers?: SourceParsers;
  /** Glob patterns over normalized asset paths; matching references are never enqueued */
  exclude?: readonly string[];
  /** References resolved at once within a wave */
  concurrency?: number;
}

interface Outcome {
  result: ResolutionResult;
  companions: CompanionFile[];
  dependencies: DiscoveredReference[];
  diagnostics: Diagnostic[];
}

/**
 * Build the resolution closure of the seed references using breadth-first
 * wave expansion.
 *
 * Each wave claims its unseen references synchronously, so a reference is
 * resolved at most once even when it shows up twice in the same wave, then
 * resolves them through a bounded pool and records the outcomes in queue
 * order.
 * Discovered references form the next wave. Individual failures are
 * recorded and never stop the walk.
 */
export async function walkCollection(
  seeds: readonly DiscoveredReference[],
  options: CollectionWalkOptions
): Promise<CollectionManifest> {
  const { index, parsers = defaultParsers, exclude = [], concurrency = IO_CONCURRENCY } = options;
  const materials = new MaterialResolver(index, parsers);
  const models = new ModelResolver(index, parsers);

  const entries = new Map<string, ManifestEntry>();
  const diagnostics: Diagnostic[] = [];
  const isExcluded = (reference: AssetReference): boolean =>
    exclude.some(pattern => minimatch(reference.path, pattern, { nocase: true, dot: true }));

  const resolveOne = async (reference: AssetReference): Promise<Outcome> => {
    switch (reference.kind) {
      case 'material':
        return { companions: [], ...(await materials.resolve(reference)) };
      case 'model':
        return models.resolve(reference);
      case 'texture':
        return { result: await index.resolve(reference.path), companions: [], dependencies: [], diagnostics: [] };
    }
  };

  const queue: DiscoveredReference[] = [...seeds];
  let waveNumber = 0;

  while (queue.length > 0) {
    waveNumber++;
    const currentWave = queue.splice(0, queue.length);
    const claimed: ManifestEntry[] = [];

    for (const { reference, referrer } of currentWave) {
      const key = referenceKey(reference);
      const existing = entries.get(key);
      if (existing) {
        if (!existing.referrers.includes(referrer)) {
          existing.referrers.push(referrer);
        }
        continue;
      }
      if (isExcluded(reference)) {
        logger.debug(`Excluded ${reference.path} (referenced by ${referrer})`);
        continue;
      }

      const entry: ManifestEntry = { reference, result: { status: 'missing' }, companions: [], referrers: [referrer] };
      entries.set(key, entry);
      claimed.push(entry);
    }

    logger.debug(`Wave ${waveNumber}: resolving ${claimed.length} of ${currentWave.length} references`);

    const outcomes = await runWithConcurrency(
      claimed.map(entry => () => resolveOne(entry.reference)),
      concurrency
    );

    outcomes.forEach((outcome, i) => {
      const entry = claimed[i];
      entry.result = outcome.result;
      entry.companions = outcome.companions;
      diagnostics.push(...outcome.diagnostics);

      const malformed = outcome.diagnostics.some(
        diagnostic => diagnostic.kind === 'malformed-asset' && diagnostic.asset === entry.reference.path
      );
      if (outcome.result.status === 'missing' && !malformed) {
        diagnostics.push({
          kind: 'missing-asset',
          asset: entry.reference.path,
          message: `${entry.reference.kind} not found in any source root${index.hasGameContent ? ' or game content' : ''}`
        });
      }

      queue.push(...outcome.dependencies);
    });
  }

  logger.debug(`Collection walk finished after ${waveNumber} waves`, { entries: entries.size, diagnostics: diagnostics.length });

  return { entries, diagnostics };
}
