import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { collectFiles, outputRelativePath, planCopies } from '../../../src/core/content/collector.js';
import { walkCollection } from '../../../src/core/content/collection-walker.js';
import { SearchPathIndex } from '../../../src/core/content/search-path-index.js';
import { materialReference } from '../../../src/core/content/asset-reference.js';
import type { GameContentRoot } from '../../../src/core/content/game-content.js';
import type { CollectionManifest } from '../../../src/types/content.js';
import { listFiles, makeTempDir, plainMaterial, removeDir, writeFixture } from '../../helpers/content-fixtures.js';

let testRoot: string;
let source: string;
let gameDir: string;
let manifest: CollectionManifest;

before(async () => {
  testRoot = await makeTempDir('collector');
  source = join(testRoot, 'source');
  gameDir = join(testRoot, 'game');

  await writeFixture(source, 'Materials/Brick/Wall.vmt', plainMaterial('LightmappedGeneric', {
    $basetexture: 'brick/wall',
    $detail: 'detail/game_noise'
  }));
  await writeFixture(source, 'Materials/Brick/wall.vtf', 'wall texture');
  await writeFixture(gameDir, 'materials/detail/game_noise.vtf', 'game texture');
  await writeFixture(gameDir, 'materials/nature/grass.vmt', plainMaterial('LightmappedGeneric', { $basetexture: 'nature/grass' }));

  const game: GameContentRoot = { installDir: testRoot, modDir: 'game', directories: [gameDir], archives: [] };
  manifest = await walkCollection([
    { reference: materialReference('brick/wall'), referrer: 'root' },
    { reference: materialReference('nature/grass'), referrer: 'root' },
    { reference: materialReference('nature/lost'), referrer: 'root' }
  ], { index: new SearchPathIndex([source], game) });
});

after(async () => {
  await removeDir(testRoot);
});

describe('collector', () => {
  it('plans only files found under source roots, lowercasing directories and keeping file names', () => {
    const output = join(testRoot, 'plan');
    assert.deepEqual(planCopies(manifest, output), [
      { source: join(source, 'Materials/Brick/Wall.vmt'), destination: join(output, 'materials/brick/Wall.vmt'), relativePath: 'materials/brick/Wall.vmt' },
      { source: join(source, 'Materials/Brick/wall.vtf'), destination: join(output, 'materials/brick/wall.vtf'), relativePath: 'materials/brick/wall.vtf' }
    ]);
  });

  it('merges directories spelled differently in two roots into one output tree', async () => {
    const upper = join(testRoot, 'upper');
    const lower = join(testRoot, 'lower');
    await writeFixture(upper, 'Materials/Stone/floor.vmt', plainMaterial('LightmappedGeneric', { $basetexture: 'stone/floor' }));
    await writeFixture(lower, 'materials/stone/floor.vtf', 'floor texture');

    const twoRoots = await walkCollection(
      [{ reference: materialReference('stone/floor'), referrer: 'root' }],
      { index: new SearchPathIndex([upper, lower]) }
    );
    const output = join(testRoot, 'out-merged');
    await collectFiles(twoRoots, output);

    assert.deepEqual(await listFiles(output), ['materials/stone/floor.vmt', 'materials/stone/floor.vtf']);
  });

  it('lowercases only the directory part of an output path', () => {
    assert.equal(outputRelativePath('Models/Props_C17/Crate01.MDL'), 'models/props_c17/Crate01.MDL');
    assert.equal(outputRelativePath('Top.txt'), 'Top.txt');
  });

  it('records game-only assets as found in game and leaves them out of the output', async () => {
    const output = join(testRoot, 'out-game');
    await collectFiles(manifest, output);

    assert.equal(manifest.entries.get('material:materials/nature/grass.vmt')?.result.status, 'found-in-game');
    assert.equal(manifest.entries.get('texture:materials/detail/game_noise.vtf')?.result.status, 'found-in-game');
    assert.deepEqual(await listFiles(output), ['materials/brick/Wall.vmt', 'materials/brick/wall.vtf']);
  });

  it('yields the same file set when run twice into one directory', async () => {
    const output = join(testRoot, 'out-twice');
    const first = await collectFiles(manifest, output);
    const filesAfterFirst = await listFiles(output);
    const second = await collectFiles(manifest, output);

    assert.equal(first.copied, 2);
    assert.equal(second.copied, 2);
    assert.deepEqual(await listFiles(output), filesAfterFirst);
    assert.equal(await fs.readFile(join(output, 'materials/brick/wall.vtf'), 'utf8'), 'wall texture');
  });

  it('writes nothing on a dry run', async () => {
    const output = join(testRoot, 'out-dry');
    const result = await collectFiles(manifest, output, { dryRun: true });

    assert.equal(result.copied, 0);
    assert.equal(result.planned.length, 2);
    await assert.rejects(fs.access(output));
  });
});
