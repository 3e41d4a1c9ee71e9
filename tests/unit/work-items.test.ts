/**
 * Tests for work item loading
 */

import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { loadWorkItems, numberField, parseWorkItems } from '../../src/phases/work-items.js';
import { tempDir } from '../helpers/fake-runner.js';

describe('Work items', () => {
  describe('parseWorkItems', () => {
    it('should normalize generator items and keep extra fields as metadata', () => {
      const items = parseWorkItems({
        items: [
          { id: 'w1', file: 'a.py', pattern: 'print_statement', tier: 'automated', line: 3 },
          'not an item',
          { file: 'b.py', type: 'string_types' },
          { id: 42, tier: 'reasoning' },
        ],
      });

      expect(items).toEqual([
        { id: 'w1', file: 'a.py', type: 'print_statement', tier: 'automated', metadata: { line: 3 } },
        { id: 'item-3', file: 'b.py', type: 'string_types', tier: '', metadata: {} },
        { id: '42', file: 'unknown', type: 'unknown', tier: 'reasoning', metadata: {} },
      ]);
    });

    it('should accept a bare array', () => {
      expect(parseWorkItems([{ id: 'x', file: 'x.py' }])).toHaveLength(1);
    });

    it('should return nothing for documents without items', () => {
      expect(parseWorkItems({ total_items: 3 })).toEqual([]);
      expect(parseWorkItems('text')).toEqual([]);
    });
  });

  describe('loadWorkItems', () => {
    it('should warn and return no items when the file is missing', () => {
      const path = join(tempDir(), 'work-items.json');
      expect(loadWorkItems(path)).toEqual({ items: [], warning: `Work items file not found: ${path}` });
    });

    it('should warn and return no items when the file is not JSON', () => {
      const path = join(tempDir(), 'work-items.json');
      writeFileSync(path, '{ broken');
      const loaded = loadWorkItems(path);
      expect(loaded.items).toEqual([]);
      expect(loaded.warning).toMatch(/^Could not read work items from /);
    });

    it('should read items from disk', () => {
      const path = join(tempDir(), 'work-items.json');
      writeFileSync(path, JSON.stringify({ items: [{ id: 'a', file: 'a.py', tier: 'reasoning' }] }));
      expect(loadWorkItems(path)).toEqual({
        items: [{ id: 'a', file: 'a.py', type: 'unknown', tier: 'reasoning', metadata: {} }],
      });
    });
  });

  describe('numberField', () => {
    it('should read only numeric counters', () => {
      expect(numberField({ total_items: 7, label: 'x' }, 'total_items')).toBe(7);
      expect(numberField({ label: 'x' }, 'label')).toBeUndefined();
      expect(numberField(undefined, 'total_items')).toBeUndefined();
    });
  });
});
