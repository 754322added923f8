import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { walkCollection } from '../../../src/core/content/collection-walker.js';
import { SearchPathIndex } from '../../../src/core/content/search-path-index.js';
import { materialReference, modelReference } from '../../../src/core/content/asset-reference.js';
import type { SourceParsers } from '../../../src/parsers/index.js';
import type { ResolutionResult } from '../../../src/types/content.js';
import { defaultParsers } from '../../../src/parsers/index.js';
import { buildStudioModel, makeTempDir, patchMaterial, plainMaterial, removeDir, writeFixture } from '../../helpers/content-fixtures.js';

let testRoot: string;
let source: string;
let wide: string;

const WIDE_MATERIALS = 3000;

class TrackingIndex extends SearchPathIndex {
  inFlight = 0;
  peak = 0;

  async resolve(relativePath: string): Promise<ResolutionResult> {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      return await super.resolve(relativePath);
    } finally {
      this.inFlight--;
    }
  }
}

async function writeModel(name: string, textures: string[]): Promise<void> {
  await writeFixture(source, `models/props/${name}.mdl`, buildStudioModel({ textures, cdMaterials: ['props/'] }));
  for (const suffix of ['.phy', '.dx90.vtx', '.vvd']) {
    await writeFixture(source, `models/props/${name}${suffix}`, suffix);
  }
}

before(async () => {
  testRoot = await makeTempDir('collection-walker');
  source = join(testRoot, 'source');

  await writeModel('a', ['shared', 'a_only']);
  await writeModel('b', ['shared']);
  await writeModel('c', ['shared', 'a_only', 'lost']);
  await writeFixture(source, 'materials/props/shared.vmt', plainMaterial('VertexLitGeneric', { $basetexture: 'props/common' }));
  await writeFixture(source, 'materials/props/a_only.vmt', plainMaterial('VertexLitGeneric', { $basetexture: 'props/common' }));
  await writeFixture(source, 'materials/props/common.vtf', 'vtf');
  await writeFixture(source, 'materials/loop/a.vmt', patchMaterial('materials/loop/b.vmt'));
  await writeFixture(source, 'materials/loop/b.vmt', patchMaterial('materials/loop/a.vmt'));

  wide = join(testRoot, 'wide');
  for (let i = 0; i < WIDE_MATERIALS; i++) {
    await writeFixture(wide, `materials/wide/mat${i}.vmt`, plainMaterial('LightmappedGeneric', {}));
  }
});

after(async () => {
  await removeDir(testRoot);
});

describe('walkCollection', () => {
  it('resolves shared assets once and records every referrer', async () => {
    const manifest = await walkCollection([
      { reference: modelReference('props/a'), referrer: 'first.vmf' },
      { reference: modelReference('props/b'), referrer: 'second.vmf' },
      { reference: modelReference('Props\\A.MDL'), referrer: 'second.vmf' }
    ], { index: new SearchPathIndex([source]) });

    assert.deepEqual([...manifest.entries.keys()], [
      'model:models/props/a.mdl',
      'model:models/props/b.mdl',
      'material:materials/props/shared.vmt',
      'material:materials/props/a_only.vmt',
      'texture:materials/props/common.vtf'
    ]);
    assert.deepEqual(manifest.entries.get('model:models/props/a.mdl')?.referrers, ['first.vmf', 'second.vmf']);
    assert.deepEqual(manifest.entries.get('material:materials/props/shared.vmt')?.referrers, [
      'model models/props/a.mdl',
      'model models/props/b.mdl'
    ]);
    assert.deepEqual(manifest.entries.get('texture:materials/props/common.vtf')?.referrers, [
      'material materials/props/shared.vmt ($basetexture)',
      'material materials/props/a_only.vmt ($basetexture)'
    ]);
    assert.deepEqual(manifest.diagnostics, []);
  });

  it('parses each shared document once', async () => {
    let materialParses = 0;
    const countingParsers: SourceParsers = {
      ...defaultParsers,
      parseMaterial(bytes) {
        materialParses++;
        return defaultParsers.parseMaterial(bytes);
      }
    };

    await walkCollection([
      { reference: modelReference('props/a'), referrer: 'root' },
      { reference: modelReference('props/b'), referrer: 'root' }
    ], { index: new SearchPathIndex([source]), parsers: countingParsers });

    assert.equal(materialParses, 2);
  });

  it('completes with one diagnostic when one of three materials is missing', async () => {
    const manifest = await walkCollection(
      [{ reference: modelReference('props/c'), referrer: 'root' }],
      { index: new SearchPathIndex([source]) }
    );

    assert.deepEqual(manifest.diagnostics, [{
      kind: 'missing-asset',
      asset: 'materials/props/lost.vmt',
      message: 'material not found in any source root'
    }]);
    assert.equal(manifest.entries.get('material:materials/props/shared.vmt')?.result.status, 'found');
    assert.equal(manifest.entries.get('material:materials/props/a_only.vmt')?.result.status, 'found');
    assert.equal(manifest.entries.get('texture:materials/props/common.vtf')?.result.status, 'found');
    assert.deepEqual(manifest.entries.get('material:materials/props/lost.vmt')?.result, { status: 'missing' });
  });

  it('never enqueues excluded references', async () => {
    const manifest = await walkCollection(
      [{ reference: modelReference('props/a'), referrer: 'root' }],
      { index: new SearchPathIndex([source]), exclude: ['materials/props/a_*'] }
    );

    assert.equal(manifest.entries.has('material:materials/props/a_only.vmt'), false);
    assert.equal(manifest.entries.has('material:materials/props/shared.vmt'), true);
  });

  it('terminates on cyclic patch chains', async () => {
    const manifest = await walkCollection(
      [{ reference: materialReference('loop/a'), referrer: 'root' }],
      { index: new SearchPathIndex([source]) }
    );

    assert.deepEqual([...manifest.entries.keys()], [
      'material:materials/loop/a.vmt',
      'material:materials/loop/b.vmt'
    ]);
    assert.deepEqual(manifest.diagnostics.map(diagnostic => diagnostic.kind), ['circular-patch-reference']);
  });

  it('handles an empty seed list', async () => {
    const manifest = await walkCollection([], { index: new SearchPathIndex([source]) });
    assert.equal(manifest.entries.size, 0);
    assert.deepEqual(manifest.diagnostics, []);
  });

  it('reads every material of a very wide wave without exhausting file handles', async () => {
    const index = new TrackingIndex([wide]);
    const seeds = Array.from({ length: WIDE_MATERIALS }, (_, i) => ({
      reference: materialReference(`wide/mat${i}`),
      referrer: `world brush ${i}`
    }));

    const manifest = await walkCollection(seeds, { index, concurrency: 4 });

    assert.deepEqual(manifest.diagnostics, []);
    assert.equal(manifest.entries.size, WIDE_MATERIALS);
    assert.equal([...manifest.entries.values()].filter(entry => entry.result.status === 'found').length, WIDE_MATERIALS);
    assert.equal(index.peak, 4);
  });
});
