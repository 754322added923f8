/**
 * End-of-run report: per-kind counts and the diagnostics grouped by asset.
 */

import pico from 'picocolors';
import type { OutputPort } from '../ports/output.js';
import type { AssetKind, CollectionManifest, Diagnostic, ManifestEntry } from '../../types/content.js';

const KIND_ORDER: readonly AssetKind[] = ['model', 'material', 'texture'];
const KIND_LABELS: Record<AssetKind, string> = {
  model: 'Models',
  material: 'Materials',
  texture: 'Textures'
};
const MAX_REFERRERS_SHOWN = 3;

export interface KindSummary {
  found: number;
  inGame: number;
  missing: number;
}

export type ContentSummary = Record<AssetKind, KindSummary>;

export interface DiagnosticGroup {
  asset: string;
  diagnostics: Diagnostic[];
  referrers: string[];
}

export function summarizeManifest(manifest: CollectionManifest): ContentSummary {
  const summary: ContentSummary = {
    model: { found: 0, inGame: 0, missing: 0 },
    material: { found: 0, inGame: 0, missing: 0 },
    texture: { found: 0, inGame: 0, missing: 0 }
  };

  for (const entry of manifest.entries.values()) {
    const counts = summary[entry.reference.kind];
    switch (entry.result.status) {
      case 'found':
        counts.found++;
        break;
      case 'found-in-game':
        counts.inGame++;
        break;
      case 'missing':
        counts.missing++;
        break;
    }
  }

  return summary;
}

/**
 * Diagnostics grouped by asset, groups in order of first appearance
 */
export function groupDiagnostics(manifest: CollectionManifest): DiagnosticGroup[] {
  const entriesByPath = new Map<string, ManifestEntry>();
  for (const entry of manifest.entries.values()) {
    if (!entriesByPath.has(entry.reference.path)) {
      entriesByPath.set(entry.reference.path, entry);
    }
  }

  const groups = new Map<string, DiagnosticGroup>();
  for (const diagnostic of manifest.diagnostics) {
    let group = groups.get(diagnostic.asset);
    if (!group) {
      group = {
        asset: diagnostic.asset,
        diagnostics: [],
        referrers: entriesByPath.get(diagnostic.asset)?.referrers ?? []
      };
      groups.set(diagnostic.asset, group);
    }
    group.diagnostics.push(diagnostic);
  }

  return [...groups.values()];
}

export function formatKindSummary(kind: AssetKind, counts: KindSummary): string {
  const parts = [`${counts.found} found`];
  if (counts.inGame > 0) parts.push(`${counts.inGame} in game`);
  if (counts.missing > 0) parts.push(`${counts.missing} missing`);
  return `${KIND_LABELS[kind]}: ${parts.join(', ')}`;
}

export function formatDiagnosticGroup(group: DiagnosticGroup): string {
  const lines = [group.asset];
  for (const diagnostic of group.diagnostics) {
    lines.push(`  - ${diagnostic.message}`);
  }
  if (group.referrers.length > 0) {
    const shown = group.referrers.slice(0, MAX_REFERRERS_SHOWN);
    const more = group.referrers.length - shown.length;
    lines.push(`  referenced by ${shown.join('; ')}${more > 0 ? ` and ${more} more` : ''}`);
  }
  return lines.join('\n');
}

export function reportCollection(
  out: OutputPort,
  manifest: CollectionManifest,
  copy: { copied: number; planned: number; dryRun: boolean; outputDir: string }
): void {
  const summary = summarizeManifest(manifest);
  const lines = KIND_ORDER
    .filter(kind => {
      const counts = summary[kind];
      return counts.found + counts.inGame + counts.missing > 0;
    })
    .map(kind => formatKindSummary(kind, summary[kind]));
  out.note(lines.length > 0 ? lines.join('\n') : 'No assets referenced', 'Content');

  const groups = groupDiagnostics(manifest);
  for (const group of groups) {
    out.warn(formatDiagnosticGroup(group));
  }

  const destination = pico.cyan(copy.outputDir);
  if (copy.dryRun) {
    out.info(`Dry run: ${copy.planned} files would be copied to ${destination}`);
  } else {
    out.success(`Copied ${copy.copied} files to ${destination}`);
  }
  if (groups.length > 0) {
    out.message(pico.yellow(`${manifest.diagnostics.length} warnings for ${groups.length} assets`));
  }
}
