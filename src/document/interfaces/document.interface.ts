import {
  DocumentPatch,
  SearchEngineStats,
  SearchResult,
} from '../../search/interfaces/search.interface';

export interface StoredDocument {
  id: string;
  title: string;
  body: string;
  tags: string[];
  folderPath: string;
  /**
   * ISO-8601 timestamps
   */
  createdAt: string;
  lastAccessed: string;
}

export interface CreateDocumentInput {
  id?: string;
  title: string;
  body: string;
  tags?: string[];
  folderPath?: string;
}

export type UpdateDocumentInput = DocumentPatch;

export interface SearchOutcome {
  query: string;
  results: SearchResult[];
  count: number;
  /**
   * Milliseconds spent in the engine
   */
  took: number;
}

export interface SuggestOutcome {
  prefix: string;
  suggestions: string[];
  count: number;
}

export interface OrganizerStats extends SearchEngineStats {
  folderCount: number;
}
