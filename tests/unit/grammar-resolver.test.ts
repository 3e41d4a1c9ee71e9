/**
 * Tests for grammar resolution and caching
 */

import { describe, it, expect } from 'vitest';
import { GrammarCache, GrammarResolver, normalizeLanguage } from '../../src/parser/tree-parser/loader.js';
import { FakeProvider } from '../helpers/fake-grammar.js';

describe('Grammar Resolver', () => {
  describe('normalizeLanguage', () => {
    it('should trim and lowercase', () => {
      expect(normalizeLanguage('  Python ')).toBe('python');
    });
  });

  describe('resolve', () => {
    it('should load a grammar once and answer later lookups from the cache', async () => {
      const provider = new FakeProvider('native', ['python']);
      const resolver = new GrammarResolver([provider]);

      const first = await resolver.resolve('python');
      const second = await resolver.resolve('Python');
      const third = await resolver.resolve(' python ');

      expect(first.ok).toBe(true);
      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(provider.calls).toEqual(['python']);
      expect(resolver.cache.loads).toBe(1);
      expect(resolver.cache.hits).toBe(2);
    });

    it('should share an in-flight load between concurrent callers', async () => {
      const provider = new FakeProvider('native', ['go']);
      const resolver = new GrammarResolver([provider]);

      const results = await Promise.all([
        resolver.resolve('go'),
        resolver.resolve('GO'),
        resolver.resolve('go'),
      ]);

      expect(results.every(r => r.ok)).toBe(true);
      expect(provider.calls).toHaveLength(1);
      expect(resolver.cache.loads).toBe(1);
    });

    it('should try providers in order and stop at the first that has the grammar', async () => {
      const native = new FakeProvider('native', []);
      const wasm = new FakeProvider('wasm', ['rust']);
      const spare = new FakeProvider('spare', ['rust']);
      const resolver = new GrammarResolver([native, wasm, spare]);

      const resolution = await resolver.resolve('rust');

      expect(resolution.ok).toBe(true);
      if (resolution.ok) {
        expect(resolution.handle.provider).toBe('wasm');
      }
      expect(native.calls).toEqual(['rust']);
      expect(spare.calls).toEqual([]);
    });

    it('should record a throwing provider and keep going', async () => {
      const native = new FakeProvider('native', ['ruby']);
      native.failure = new Error('broken binding');
      const wasm = new FakeProvider('wasm', []);
      const resolver = new GrammarResolver([native, wasm]);

      const resolution = await resolver.resolve('ruby');

      expect(resolution).toEqual({
        ok: false,
        language: 'ruby',
        attempts: [
          { provider: 'native', outcome: 'failed', message: 'broken binding' },
          { provider: 'wasm', outcome: 'unavailable' },
        ],
      });
    });

    it('should not cache a failed resolution', async () => {
      const provider = new FakeProvider('native', []);
      const resolver = new GrammarResolver([provider]);

      expect((await resolver.resolve('kotlin')).ok).toBe(false);
      expect(resolver.cache.has('kotlin')).toBe(false);

      provider.languages.push('kotlin');
      expect((await resolver.resolve('kotlin')).ok).toBe(true);
      expect(resolver.cache.loads).toBe(2);
      expect(resolver.cache.size).toBe(1);
    });

    it('should reject an empty language name without asking providers', async () => {
      const provider = new FakeProvider('native', ['python']);
      const resolver = new GrammarResolver([provider]);

      const resolution = await resolver.resolve('   ');

      expect(resolution).toEqual({ ok: false, language: '', attempts: [] });
      expect(provider.calls).toEqual([]);
    });

    it('should expose provider names in priority order', () => {
      const resolver = new GrammarResolver([new FakeProvider('native', []), new FakeProvider('wasm', [])]);
      expect(resolver.providerNames).toEqual(['native', 'wasm']);
    });
  });

  describe('GrammarCache', () => {
    it('should drop an entry whose load rejected', async () => {
      const cache = new GrammarCache();
      await expect(cache.getOrLoad('c', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
      expect(cache.has('c')).toBe(false);
    });
  });
});
