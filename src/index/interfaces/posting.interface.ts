/**
 * Term frequency table for a single document: token -> occurrence count
 */
export type FrequencyTable = Map<string, number>;

/**
 * Interface for term dictionary operations.
 *
 * A dictionary keeps two views of the same data in step: the posting sets
 * (term -> documents containing it) and the per-document frequency tables.
 */
export interface TermDictionary {
  /**
   * Register a document's frequency table, replacing any previous one for the same ID
   */
  addDocument(documentId: string, frequencies: FrequencyTable): void;

  /**
   * Drop a document from every posting set it appears in
   * @returns false if the document was not indexed
   */
  removeDocument(documentId: string): boolean;

  /**
   * Whether a frequency table exists for the document
   */
  hasDocument(documentId: string): boolean;

  /**
   * Get the documents containing a term
   */
  getPostings(term: string): ReadonlySet<string> | undefined;

  /**
   * Get a document's frequency table
   */
  getFrequencies(documentId: string): ReadonlyMap<string, number> | undefined;

  /**
   * Get all terms that currently have at least one posting
   */
  getTerms(): string[];

  /**
   * Number of live terms
   */
  size(): number;

  /**
   * Number of indexed documents
   */
  documentCount(): number;

  /**
   * Remove everything
   */
  clear(): void;
}
