import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatPathForDisplay } from '../../src/utils/formatters.js';

describe('formatPathForDisplay', () => {
  it('shows paths inside cwd relative to it', () => {
    assert.equal(formatPathForDisplay('/home/player/maps/out', '/home/player/maps', '/home/player'), 'out');
    assert.equal(formatPathForDisplay('/home/player/maps', '/home/player/maps', '/home/player'), '.');
  });

  it('uses tilde notation for other paths under home', () => {
    assert.equal(formatPathForDisplay('/home/player/content', '/tmp', '/home/player'), '~/content');
  });

  it('leaves other paths alone', () => {
    assert.equal(formatPathForDisplay('/srv/content', '/tmp', '/home/player'), '/srv/content');
    assert.equal(formatPathForDisplay('relative/path', '/tmp', '/home/player'), 'relative/path');
  });
});
