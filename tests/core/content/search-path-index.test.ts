import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { SearchPathIndex } from '../../../src/core/content/search-path-index.js';
import { VpkIndex } from '../../../src/core/content/vpk-index.js';
import type { GameContentRoot } from '../../../src/core/content/game-content.js';
import { buildVpkDirectory, makeTempDir, removeDir, writeFixture } from '../../helpers/content-fixtures.js';

let testRoot: string;
let first: string;
let second: string;
let gameDir: string;
let game: GameContentRoot;

before(async () => {
  testRoot = await makeTempDir('search-path-index');
  first = join(testRoot, 'first');
  second = join(testRoot, 'second');
  gameDir = join(testRoot, 'game', 'garrysmod');

  await writeFixture(first, 'materials/shared.vmt', 'first');
  await writeFixture(second, 'materials/shared.vmt', 'second');
  await writeFixture(second, 'Materials/Metal/Crate.VTF', 'crate');
  await writeFixture(gameDir, 'materials/game_only.vmt', 'game');
  await writeFixture(second, '.DS_Store', 'junk');

  game = {
    installDir: join(testRoot, 'game'),
    modDir: 'garrysmod',
    directories: [gameDir],
    archives: [VpkIndex.fromBuffer('pak01_dir.vpk', buildVpkDirectory(['materials/packed.vtf']))]
  };
});

after(async () => {
  await removeDir(testRoot);
});

describe('SearchPathIndex', () => {
  it('returns the highest-priority root holding the path', async () => {
    const index = new SearchPathIndex([first, second], game);
    const result = await index.resolve('materials/shared.vmt');

    assert.ok(result.status === 'found');
    assert.equal(result.root.priority, 0);
    assert.equal(result.absolutePath, join(first, 'materials/shared.vmt'));
  });

  it('follows root order, not directory names', async () => {
    const index = new SearchPathIndex([second, first]);
    const result = await index.resolve('materials/shared.vmt');

    assert.ok(result.status === 'found');
    assert.equal(result.root.directory, second);
  });

  it('matches paths case-insensitively and reports the on-disk spelling', async () => {
    const index = new SearchPathIndex([first, second]);
    const result = await index.resolve('materials/metal/crate.vtf');

    assert.ok(result.status === 'found');
    assert.equal(result.relativePath, 'Materials/Metal/Crate.VTF');
    assert.equal(result.absolutePath, join(second, 'Materials/Metal/Crate.VTF'));
    assert.equal(result.root.priority, 1);
  });

  it('falls back to game directories, then game archives', async () => {
    const index = new SearchPathIndex([first, second], game);

    assert.deepEqual(await index.resolve('materials/game_only.vmt'), {
      status: 'found-in-game',
      absolutePath: join(gameDir, 'materials/game_only.vmt')
    });
    assert.deepEqual(await index.resolve('materials/packed.vtf'), {
      status: 'found-in-game',
      absolutePath: 'materials/packed.vtf',
      archive: 'pak01_dir.vpk'
    });
  });

  it('reports missing paths, including game content when there is no game root', async () => {
    const withoutGame = new SearchPathIndex([first, second]);

    assert.deepEqual(await withoutGame.resolve('materials/game_only.vmt'), { status: 'missing' });
    assert.deepEqual(await withoutGame.resolve('materials/nowhere.vmt'), { status: 'missing' });
    assert.deepEqual(await withoutGame.resolve('.ds_store'), { status: 'missing' });
  });

  it('shares one lookup between callers of the same path', async () => {
    const index = new SearchPathIndex([first]);
    const a = index.resolve('Materials\\Shared.vmt');
    const b = index.resolve('materials/shared.vmt');
    assert.equal(a, b);
  });
});
