import { Tokenizer } from '../../analysis/interfaces/tokenizer.interface';
import { Scorer } from '../../index/interfaces/scoring.interface';

/**
 * Searchable fields of a document
 */
export interface DocumentFields {
  title: string;
  body: string;
  tags: string[];
}

/**
 * Document as held by the engine
 */
export interface IndexedDocument extends DocumentFields {
  id: string;
}

/**
 * Partial update of a document's searchable fields
 */
export type DocumentPatch = Partial<DocumentFields>;

export interface SearchResult extends IndexedDocument {
  /**
   * Relevance rounded to 4 decimal places
   */
  relevanceScore: number;
}

export interface SearchEngineStats {
  documentCount: number;
  vocabularySize: number;
  suggestionCount: number;
  cachedQueries: number;
  cacheCapacity: number;
}

export interface SearchEngineOptions {
  /**
   * Maximum number of cached result lists
   */
  cacheCapacity: number;

  /**
   * Clock in epoch milliseconds, defaults to Date.now
   */
  now?: () => number;

  tokenizer?: Tokenizer;
  scorer?: Scorer;
}
