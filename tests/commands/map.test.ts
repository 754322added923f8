import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatMapStats } from '../../src/commands/map.js';

describe('map stats', () => {
  it('lists entity classes by count, then name', () => {
    const lines = formatMapStats({
      solids: 4,
      sides: 24,
      entities: 4,
      brushEntities: 1,
      entityClasses: new Map([['prop_static', 1], ['light', 2], ['func_detail', 1]])
    });

    assert.deepEqual(lines, [
      'Solids: 4 (24 sides)',
      'Entities: 4 (1 with brushes)',
      `  ${'light'.padEnd(32)}2`,
      `  ${'func_detail'.padEnd(32)}1`,
      `  ${'prop_static'.padEnd(32)}1`
    ]);
  });
});
