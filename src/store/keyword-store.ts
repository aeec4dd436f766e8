// ============================================================================
// Keyword Store - process-wide sensitive keyword set, swapped atomically
// ============================================================================

import fs from 'fs/promises';
import path from 'path';
import axios from 'axios';
import { Logger } from '../utils/logger';
import { KeywordSetLoadError, errorMessage } from '../core/errors';
import { KeywordSnapshot } from '../types';

export interface KeywordSource {
  describe(): string;
  read(): Promise<string>;
}

export class FileKeywordSource implements KeywordSource {
  private readonly filePath: string;

  constructor(filePath: string, baseDir: string = process.cwd()) {
    this.filePath = path.isAbsolute(filePath) ? filePath : path.join(baseDir, filePath);
  }

  describe(): string {
    return `file:${this.filePath}`;
  }

  async read(): Promise<string> {
    return fs.readFile(this.filePath, 'utf-8');
  }
}

export class UrlKeywordSource implements KeywordSource {
  constructor(private readonly url: string, private readonly timeoutMs = 10_000) {}

  describe(): string {
    return this.url;
  }

  async read(): Promise<string> {
    const response = await axios.get<string>(this.url, {
      timeout: this.timeoutMs,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  }
}

export function keywordSourceFor(location: string): KeywordSource {
  return /^https?:\/\//i.test(location) ? new UrlKeywordSource(location) : new FileKeywordSource(location);
}

/** Comma- or newline-separated terms; lowercased, trimmed, de-duplicated in order. */
export function parseKeywordList(content: string): string[] {
  const seen = new Set<string>();
  for (const raw of content.split(/[,\r\n]+/)) {
    const keyword = raw.trim().toLowerCase();
    if (keyword !== '' && !keyword.startsWith('#')) seen.add(keyword);
  }
  return [...seen];
}

/**
 * Holds one frozen {@link KeywordSnapshot}. Reload builds the next snapshot in
 * full before replacing the reference, so a scoring run that captured the
 * previous snapshot keeps a consistent view.
 */
export class KeywordStore {
  private logger = new Logger('keyword-store');
  private snapshot?: KeywordSnapshot;
  private version = 0;

  constructor(private readonly source: KeywordSource) {}

  /** Initial load. Throws {@link KeywordSetLoadError}; callers treat it as fatal. */
  async load(): Promise<KeywordSnapshot> {
    const next = this.install(await this.readKeywords());
    this.logger.info(`Loaded ${next.keywords.length} sensitive keyword(s)`, { source: next.source, version: next.version });
    return next;
  }

  /**
   * Re-reads the source. On failure the current set stays in effect and the
   * error is logged. An unchanged list keeps the current snapshot and version.
   */
  async reload(): Promise<{ reloaded: boolean; changed: boolean; snapshot: KeywordSnapshot; error?: string }> {
    const current = this.current();
    try {
      const keywords = await this.readKeywords();
      if (sameKeywords(keywords, current.keywords)) {
        this.logger.debug('Keyword source unchanged', { version: current.version });
        return { reloaded: true, changed: false, snapshot: current };
      }
      const next = this.install(keywords);
      this.logger.info(`Reloaded ${next.keywords.length} sensitive keyword(s)`, { version: next.version });
      return { reloaded: true, changed: true, snapshot: next };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Keyword reload failed, keeping previous set', { error: message, version: current.version });
      return { reloaded: false, changed: false, snapshot: current, error: message };
    }
  }

  current(): KeywordSnapshot {
    if (!this.snapshot) {
      throw new KeywordSetLoadError('Sensitive keyword set has not been loaded', this.source.describe());
    }
    return this.snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== undefined;
  }

  private async readKeywords(): Promise<string[]> {
    const sourceName = this.source.describe();
    let content: string;
    try {
      content = await this.source.read();
    } catch (error) {
      throw new KeywordSetLoadError(`Cannot read keyword source ${sourceName}: ${errorMessage(error)}`, sourceName);
    }

    const keywords = parseKeywordList(content);
    if (keywords.length === 0) {
      throw new KeywordSetLoadError(`Keyword source ${sourceName} contains no keywords`, sourceName);
    }

    return keywords;
  }

  private install(keywords: string[]): KeywordSnapshot {
    this.version += 1;
    const next = Object.freeze({
      version: this.version,
      keywords: Object.freeze(keywords),
      source: this.source.describe(),
      loadedAt: new Date(),
    });
    this.snapshot = next;
    return next;
  }
}

function sameKeywords(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((keyword, i) => keyword === b[i]);
}

/** Snapshot for callers that already hold a keyword list (CLI, tests). */
export function staticSnapshot(keywords: readonly string[], version = 1, source = 'inline'): KeywordSnapshot {
  return Object.freeze({
    version,
    keywords: Object.freeze(parseKeywordList(keywords.join('\n'))),
    source,
    loadedAt: new Date(0),
  });
}
