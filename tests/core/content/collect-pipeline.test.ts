import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { collectContent, locateRootModel } from '../../../src/core/content/collect-pipeline.js';
import { FileSystemError, ValidationError } from '../../../src/utils/errors.js';
import { buildStudioModel, listFiles, makeTempDir, plainMaterial, removeDir, writeFixture } from '../../helpers/content-fixtures.js';

let testRoot: string;
let source: string;

before(async () => {
  testRoot = await makeTempDir('collect-pipeline');
  source = join(testRoot, 'source');

  await writeFixture(source, 'models/props/crate.mdl', buildStudioModel({ textures: ['crate'], cdMaterials: ['metal/'] }));
  await writeFixture(source, 'models/props/crate.dx90.vtx', 'vtx');
  await writeFixture(source, 'models/props/crate.vvd', 'vvd');
  await writeFixture(source, 'materials/metal/crate.vmt', plainMaterial('VertexLitGeneric', { $basetexture: 'metal/crate' }));
  await writeFixture(source, 'materials/metal/crate.vtf', 'vtf');

  await writeFixture(testRoot, 'maps/arena.vmf', `
world
{
  "id" "1"
  solid { "id" "2" side { "id" "1" "material" "METAL/CRATE" } side { "id" "2" "material" "dev/missing" } }
}
entity { "id" "3" "classname" "prop_physics" "model" "models/props/crate.mdl" }
`);
  await writeFixture(testRoot, 'maps/broken.vmf', 'world {');
});

after(async () => {
  await removeDir(testRoot);
});

describe('collectContent', () => {
  it('collects a model with its siblings, material and texture', async () => {
    const output = join(testRoot, 'out-model');
    const result = await collectContent({
      rootKind: 'model',
      rootFiles: [join(source, 'models/props/crate.mdl')],
      sourceRoots: [source],
      outputDir: output,
      game: null
    });

    assert.deepEqual(await listFiles(output), [
      'materials/metal/crate.vmt',
      'materials/metal/crate.vtf',
      'models/props/crate.dx90.vtx',
      'models/props/crate.mdl',
      'models/props/crate.vvd'
    ]);
    assert.deepEqual(result.manifest.diagnostics, [{
      kind: 'missing-optional-file',
      asset: 'models/props/crate.mdl',
      message: 'missing optional file: .phy'
    }]);
    assert.equal(result.copy.copied, 5);
  });

  it('collects everything a map references and reports what is missing', async () => {
    const output = join(testRoot, 'out-map');
    const result = await collectContent({
      rootKind: 'map',
      rootFiles: [join(testRoot, 'maps/arena.vmf')],
      sourceRoots: [source],
      outputDir: output,
      game: null
    });

    assert.deepEqual(await listFiles(output), [
      'materials/metal/crate.vmt',
      'materials/metal/crate.vtf',
      'models/props/crate.dx90.vtx',
      'models/props/crate.mdl',
      'models/props/crate.vvd'
    ]);
    assert.deepEqual(result.manifest.diagnostics.map(diagnostic => [diagnostic.kind, diagnostic.asset]), [
      ['missing-asset', 'materials/dev/missing.vmt'],
      ['missing-optional-file', 'models/props/crate.mdl']
    ]);
    assert.deepEqual(result.manifest.entries.get('material:materials/metal/crate.vmt')?.referrers, [
      'arena.vmf: world brush 2',
      'model models/props/crate.mdl'
    ]);
  });

  it('searches the content tree of a root model outside every source root', async () => {
    const loose = join(testRoot, 'loose');
    await writeFixture(loose, 'models/solo.mdl', buildStudioModel({ textures: [], cdMaterials: [] }));

    const result = await collectContent({
      rootKind: 'model',
      rootFiles: [join(loose, 'models/solo.mdl')],
      sourceRoots: [source],
      outputDir: join(testRoot, 'out-loose'),
      game: null,
      dryRun: true
    });

    assert.deepEqual(result.searchRoots, [source, loose]);
    assert.equal(result.manifest.entries.get('model:models/solo.mdl')?.result.status, 'found');
    assert.deepEqual(result.copy.planned.map(copy => copy.relativePath), ['models/solo.mdl']);
  });

  it('turns an undecodable map into a diagnostic', async () => {
    const result = await collectContent({
      rootKind: 'map',
      rootFiles: [join(testRoot, 'maps/broken.vmf')],
      sourceRoots: [source],
      outputDir: join(testRoot, 'out-broken'),
      game: null
    });

    assert.equal(result.manifest.entries.size, 0);
    assert.deepEqual(result.manifest.diagnostics, [{
      kind: 'malformed-asset',
      asset: 'broken.vmf',
      message: 'malformed map: Unexpected end of document inside a block'
    }]);
  });

  it('aborts before the walk when a source root is not a directory', async () => {
    await assert.rejects(
      collectContent({
        rootKind: 'map',
        rootFiles: [join(testRoot, 'maps/arena.vmf')],
        sourceRoots: [join(testRoot, 'maps/arena.vmf')],
        outputDir: join(testRoot, 'out-fatal'),
        game: null
      }),
      FileSystemError
    );
  });

  it('aborts before copying when the output directory cannot be created', async () => {
    const blocked = join(source, 'materials/metal/crate.vtf', 'out');

    await assert.rejects(
      collectContent({
        rootKind: 'model',
        rootFiles: [join(source, 'models/props/crate.mdl')],
        sourceRoots: [source],
        outputDir: blocked,
        game: null
      }),
      (error: unknown) => error instanceof FileSystemError && error.message.includes(`Failed to locate or create directory: ${blocked}`)
    );
    assert.deepEqual(await listFiles(join(source, 'materials/metal')), ['crate.vmt', 'crate.vtf']);
  });

  it('aborts when a root file does not exist', async () => {
    await assert.rejects(
      collectContent({
        rootKind: 'map',
        rootFiles: [join(testRoot, 'maps/nope.vmf')],
        sourceRoots: [source],
        outputDir: join(testRoot, 'out-nope'),
        game: null
      }),
      ValidationError
    );
  });
});

describe('locateRootModel', () => {
  it('prefers the source root that holds the model', () => {
    assert.deepEqual(locateRootModel(join('/content', 'models', 'a.mdl'), ['/content']), {
      root: '/content',
      relativePath: 'models/a.mdl'
    });
  });

  it('falls back to the last "models" segment', () => {
    assert.deepEqual(locateRootModel(join('/addon', 'Models', 'props', 'A.mdl'), ['/content']), {
      root: '/addon',
      relativePath: 'models/props/a.mdl'
    });
  });

  it('rejects models outside any content tree', () => {
    assert.throws(() => locateRootModel('/tmp/a.mdl', []), ValidationError);
  });
});
