import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { ConfigManager, isConfigKey, parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir, writeFixture } from '../helpers/content-fixtures.js';

let configDir: string;

beforeEach(async () => {
  configDir = await makeTempDir('config');
});

afterEach(async () => {
  await removeDir(configDir);
});

describe('ConfigManager', () => {
  it('treats a missing file as an empty configuration and does not create one', async () => {
    const manager = new ConfigManager({ config: configDir });

    assert.deepEqual(await manager.getAll(), {});
    assert.equal(await manager.get('game.dir'), undefined);
    assert.deepEqual(await fs.readdir(configDir), []);
  });

  it('reads JSONC with comments and trailing commas', async () => {
    await writeFixture(configDir, 'config.jsonc', `{
  // where the game lives
  "game": { "dir": "/games/gmod", "appId": 4000, },
  "exclude": ["materials/dev/**"],
}`);
    const manager = new ConfigManager({ config: configDir });

    assert.equal(await manager.get('game.dir'), '/games/gmod');
    assert.equal(await manager.get('game.appId'), 4000);
    assert.deepEqual(await manager.get('exclude'), ['materials/dev/**']);
    assert.equal(await manager.getConfigFilePath(), join(configDir, 'config.jsonc'));
  });

  it('prefers an existing config.json when saving', async () => {
    await writeFixture(configDir, 'config.json', '{}');
    const manager = new ConfigManager({ config: configDir });

    await manager.set('game.modDir', 'cstrike');

    assert.deepEqual(JSON.parse(await fs.readFile(join(configDir, 'config.json'), 'utf8')), { game: { modDir: 'cstrike' } });
  });

  it('resolves a relative game directory against the given base directory', async () => {
    const manager = new ConfigManager({ config: configDir });
    const base = join(configDir, 'workspace');

    await manager.set('game.dir', '../games/gmod', base);

    assert.equal(await manager.get('game.dir'), join(configDir, 'games', 'gmod'));
  });

  it('sets and unsets values', async () => {
    const manager = new ConfigManager({ config: configDir });

    await manager.set('game.dir', 'relative/gmod');
    await manager.set('game.appId', '240');
    await manager.set('exclude', 'materials/dev/**, models/editor/**,');

    const saved: unknown = JSON.parse(await fs.readFile(join(configDir, 'config.jsonc'), 'utf8'));
    assert.deepEqual(saved, {
      game: { dir: resolve('relative/gmod'), appId: 240 },
      exclude: ['materials/dev/**', 'models/editor/**']
    });

    await manager.unset('game.dir');
    await manager.unset('game.appId');
    await manager.unset('exclude');
    assert.deepEqual(await manager.getAll(), {});
  });

  it('rejects invalid values', async () => {
    const manager = new ConfigManager({ config: configDir });
    await assert.rejects(manager.set('game.appId', 'gmod'), ConfigError);
    await assert.rejects(manager.set('game.appId', '-4'), ConfigError);
  });

  it('rejects a config file of the wrong shape', async () => {
    await writeFixture(configDir, 'config.jsonc', '{ "exclude": "materials/dev/**" }');
    const manager = new ConfigManager({ config: configDir });
    await assert.rejects(manager.load(), ConfigError);
  });

  it('wraps unparseable files in a ConfigError', async () => {
    await writeFixture(configDir, 'config.jsonc', '{ "game": ');
    const manager = new ConfigManager({ config: configDir });
    await assert.rejects(manager.load(), ConfigError);
  });
});

describe('parseConfig', () => {
  it('validates nested game settings', () => {
    assert.deepEqual(parseConfig({ game: { modDir: 'garrysmod' } }, 'config.jsonc'), {
      game: { dir: undefined, modDir: 'garrysmod', appId: undefined }
    });
    assert.throws(() => parseConfig({ game: { dir: 42 } }, 'config.jsonc'), /"game.dir" must be a string/);
    assert.throws(() => parseConfig([], 'config.jsonc'), ConfigError);
  });

  it('knows its keys', () => {
    assert.equal(isConfigKey('game.dir'), true);
    assert.equal(isConfigKey('game'), false);
  });
});
