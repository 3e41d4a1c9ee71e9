/**
 * Tests for extension-based language detection
 */

import { describe, it, expect } from 'vitest';
import { detectLanguage, supportedExtensions } from '../../src/parser/language-detect.js';

describe('detectLanguage', () => {
  it('should map common extensions', () => {
    expect(detectLanguage('src/app.py')).toBe('python');
    expect(detectLanguage('lib/index.mjs')).toBe('javascript');
    expect(detectLanguage('ui/App.tsx')).toBe('tsx');
    expect(detectLanguage('Main.cs')).toBe('csharp');
  });

  it('should ignore extension case', () => {
    expect(detectLanguage('LEGACY.PY')).toBe('python');
  });

  it('should return undefined for unknown or missing extensions', () => {
    expect(detectLanguage('Makefile')).toBeUndefined();
    expect(detectLanguage('notes.txt')).toBeUndefined();
  });

  it('should list extensions with their leading dot', () => {
    expect(supportedExtensions()).toContain('.rs');
  });
});
