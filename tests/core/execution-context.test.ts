/**
 * Tests for ExecutionContext module
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createExecutionContext, resolveFromContext } from '../../src/core/execution-context.js';
import { ValidationError } from '../../src/utils/errors.js';
import { mkdir, rm } from 'fs/promises';
import { realpathSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('ExecutionContext', () => {
  let testDir: string;
  let originalCwd: string;

  beforeEach(async () => {
    originalCwd = process.cwd();

    testDir = join(tmpdir(), `srcpack-context-${Date.now()}`);
    await mkdir(join(testDir, 'subdir'), { recursive: true });

    // Resolve real path (handles /private on macOS)
    testDir = realpathSync(testDir);
    process.chdir(testDir);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    await rm(testDir, { recursive: true, force: true });
  });

  it('uses the process working directory by default', async () => {
    const context = await createExecutionContext({});
    assert.strictEqual(context.sourceCwd, testDir);
  });

  it('resolves --cwd against the process working directory', async () => {
    const context = await createExecutionContext({ cwd: 'subdir' });
    assert.strictEqual(context.sourceCwd, join(testDir, 'subdir'));
    assert.strictEqual(resolveFromContext(context, 'maps/a.vmf'), join(testDir, 'subdir', 'maps', 'a.vmf'));
  });

  it('rejects a --cwd that is not a directory', async () => {
    await assert.rejects(createExecutionContext({ cwd: 'missing' }), ValidationError);
  });
});
