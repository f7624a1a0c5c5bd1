import { Logger } from '@nestjs/common';
import { Tokenizer } from '../analysis/interfaces/tokenizer.interface';
import { StandardTokenizer } from '../analysis/tokenizers/standard-tokenizer';
import { AccessHistory } from '../index/access-history';
import { BoundedResultCache } from '../index/bounded-result-cache';
import { Scorer } from '../index/interfaces/scoring.interface';
import { PrefixIndex } from '../index/prefix-index';
import { RelevanceScorer } from '../index/relevance-scorer';
import { buildFrequencyTable, InMemoryTermDictionary } from '../index/term-dictionary';
import {
  DocumentPatch,
  IndexedDocument,
  SearchEngineOptions,
  SearchEngineStats,
  SearchResult,
} from './interfaces/search.interface';
import { selectTopK } from './top-k-selector';

interface Candidate {
  id: string;
  score: number;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function intersect(sets: ReadonlySet<string>[]): Set<string> {
  const [smallest, ...rest] = [...sets].sort((a, b) => a.size - b.size);
  const result = new Set<string>();
  if (!smallest) return result;

  for (const id of smallest) {
    if (rest.every((set) => set.has(id))) {
      result.add(id);
    }
  }
  return result;
}

function union(sets: ReadonlySet<string>[]): Set<string> {
  const result = new Set<string>();
  for (const set of sets) {
    for (const id of set) {
      result.add(id);
    }
  }
  return result;
}

/**
 * In-memory keyword search over short documents.
 *
 * Maintains the inverted index, per-document frequency tables, access history,
 * the autocomplete trie and an LRU cache of ranked result lists. Every
 * operation is synchronous.
 */
export class SearchEngine {
  private readonly logger = new Logger(SearchEngine.name);
  private readonly documents = new Map<string, IndexedDocument>();
  private readonly dictionary = new InMemoryTermDictionary();
  private readonly accessHistory = new AccessHistory();
  private readonly prefixIndex = new PrefixIndex();
  private readonly cache: BoundedResultCache<SearchResult[]>;
  private readonly tokenizer: Tokenizer;
  private readonly scorer: Scorer;
  private readonly now: () => number;

  constructor(options: SearchEngineOptions) {
    this.cache = new BoundedResultCache<SearchResult[]>(options.cacheCapacity);
    this.tokenizer = options.tokenizer ?? new StandardTokenizer();
    this.scorer = options.scorer ?? new RelevanceScorer();
    this.now = options.now ?? Date.now;
  }

  index(id: string, title: string, body: string, tags: string[] = []): void {
    const tokens = this.tokenizer.tokenize(`${title} ${body} ${tags.join(' ')}`);

    this.dictionary.addDocument(id, buildFrequencyTable(tokens));
    for (const token of tokens) {
      this.prefixIndex.insert(token);
    }

    this.documents.set(id, { id, title, body, tags: [...tags] });
    this.cache.clear();
  }

  /**
   * Drop a document from the index. Its tokens stay available to autocomplete.
   */
  remove(id: string): void {
    if (!this.documents.has(id)) return;

    this.dictionary.removeDocument(id);
    this.documents.delete(id);
    this.accessHistory.delete(id);
    this.cache.clear();
  }

  /**
   * Merge a patch over the stored fields and re-index. Clears the document's access history.
   * @returns false if the document is not indexed
   */
  update(id: string, patch: DocumentPatch): boolean {
    const current = this.documents.get(id);
    if (!current) return false;

    const title = patch.title ?? current.title;
    const body = patch.body ?? current.body;
    const tags = patch.tags ?? current.tags;

    this.remove(id);
    this.index(id, title, body, tags);
    return true;
  }

  recordAccess(id: string): void {
    this.accessHistory.record(id, this.now());
  }

  search(query: string, topK: number): SearchResult[] {
    const cacheKey = `search:${query}:${topK}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug(`Cache hit for ${cacheKey}`);
      return cached.map((result) => ({ ...result, tags: [...result.tags] }));
    }

    const terms = this.tokenizer.tokenize(query);
    if (terms.length === 0) {
      return [];
    }

    if (!(topK > 0)) {
      this.cache.put(cacheKey, []);
      return [];
    }

    const now = this.now();
    const candidates: Candidate[] = [];
    for (const id of this.findCandidates(terms)) {
      const score = this.scorer.score(terms, {
        frequencies: this.dictionary.getFrequencies(id),
        lastAccess: this.accessHistory.lastAccess(id),
        accessCount: this.accessHistory.count(id),
        now,
      });
      this.recordAccess(id);
      candidates.push({ id, score });
    }

    const results: SearchResult[] = [];
    for (const { id, score } of selectTopK(candidates, topK, compareCandidates)) {
      const document = this.documents.get(id);
      if (!document) continue;
      results.push({ ...document, tags: [...document.tags], relevanceScore: round4(score) });
    }

    this.cache.put(
      cacheKey,
      results.map((result) => ({ ...result, tags: [...result.tags] })),
    );
    return results;
  }

  autocomplete(prefix: string, limit: number = 10): string[] {
    return this.prefixIndex.autocomplete(prefix, limit);
  }

  clearCache(): void {
    this.cache.clear();
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  getIndexedDocument(id: string): IndexedDocument | undefined {
    const document = this.documents.get(id);
    return document ? { ...document, tags: [...document.tags] } : undefined;
  }

  getStats(): SearchEngineStats {
    return {
      documentCount: this.documents.size,
      vocabularySize: this.dictionary.size(),
      suggestionCount: this.prefixIndex.size,
      cachedQueries: this.cache.size,
      cacheCapacity: this.cache.capacity,
    };
  }

  // Documents holding every term, or any term when none holds them all
  private findCandidates(terms: string[]): Set<string> {
    const postings: ReadonlySet<string>[] = [];
    let missing = false;
    for (const term of new Set(terms)) {
      const documents = this.dictionary.getPostings(term);
      if (documents) {
        postings.push(documents);
      } else {
        missing = true;
      }
    }

    const all = missing ? new Set<string>() : intersect(postings);
    return all.size > 0 ? all : union(postings);
  }
}
