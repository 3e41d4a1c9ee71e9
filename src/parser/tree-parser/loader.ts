/**
 * Grammar resolution with a per-resolver cache.
 *
 * Providers are tried in priority order; the first one that yields a parser
 * wins and is memoized under the normalized language name for the lifetime of
 * the cache. Failed resolutions are not memoized.
 */

import { errorMessage } from '../../utils/errors.js';
import { silentLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import type { ParserHandle } from './types.js';

/**
 * A source of tree-sitter grammars (native binding, WASM runtime, …).
 * Returns undefined when it has no grammar for the language; throws when
 * loading fails.
 */
export interface GrammarProvider {
  readonly name: string;
  tryResolve(language: string): Promise<ParserHandle | undefined>;
}

export interface ProviderAttempt {
  provider: string;
  outcome: 'unavailable' | 'failed';
  message?: string;
}

export type GrammarResolution =
  | { ok: true; language: string; handle: ParserHandle }
  | { ok: false; language: string; attempts: ProviderAttempt[] };

export function normalizeLanguage(language: string): string {
  return language.trim().toLowerCase();
}

/**
 * Memoizes grammar resolutions by normalized language. Populated on miss,
 * never evicted. In-flight loads are shared, so each key is loaded at most
 * once even when callers race.
 */
export class GrammarCache {
  private readonly entries = new Map<string, Promise<GrammarResolution>>();
  private loadCount = 0;
  private hitCount = 0;

  /** Number of loads started (one per cache miss) */
  get loads(): number {
    return this.loadCount;
  }

  /** Number of lookups answered from the cache */
  get hits(): number {
    return this.hitCount;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getOrLoad(key: string, load: () => Promise<GrammarResolution>): Promise<GrammarResolution> {
    const existing = this.entries.get(key);
    if (existing) {
      this.hitCount++;
      return existing;
    }

    this.loadCount++;
    const pending = load().then(
      resolution => {
        if (!resolution.ok) this.entries.delete(key);
        return resolution;
      },
      (err: unknown) => {
        this.entries.delete(key);
        throw err;
      }
    );
    this.entries.set(key, pending);
    return pending;
  }
}

export class GrammarResolver {
  constructor(
    private readonly providers: readonly GrammarProvider[],
    readonly cache: GrammarCache = new GrammarCache(),
    private readonly logger: Logger = silentLogger
  ) {}

  get providerNames(): string[] {
    return this.providers.map(p => p.name);
  }

  /**
   * Resolve a language name to a parser. Never throws: when no provider can
   * supply the grammar the result is `{ ok: false }` with one attempt per
   * provider.
   */
  resolve(language: string): Promise<GrammarResolution> {
    const key = normalizeLanguage(language);
    if (key === '') {
      return Promise.resolve({ ok: false, language: key, attempts: [] });
    }
    return this.cache.getOrLoad(key, () => this.load(key));
  }

  private async load(language: string): Promise<GrammarResolution> {
    const attempts: ProviderAttempt[] = [];

    for (const provider of this.providers) {
      try {
        const handle = await provider.tryResolve(language);
        if (handle) {
          this.logger.debug(`Loaded ${language} grammar from ${provider.name} provider`);
          return { ok: true, language, handle };
        }
        attempts.push({ provider: provider.name, outcome: 'unavailable' });
      } catch (err) {
        const message = errorMessage(err);
        this.logger.warn(`Error loading parser for ${language} from ${provider.name}: ${message}`);
        attempts.push({ provider: provider.name, outcome: 'failed', message });
      }
    }

    return { ok: false, language, attempts };
  }
}
