import { Logger } from '@nestjs/common';
import { FrequencyTable, TermDictionary } from './interfaces/posting.interface';

/**
 * Count occurrences of each token
 */
export function buildFrequencyTable(tokens: Iterable<string>): FrequencyTable {
  const frequencies: FrequencyTable = new Map();
  for (const token of tokens) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
}

export class InMemoryTermDictionary implements TermDictionary {
  private readonly logger = new Logger(InMemoryTermDictionary.name);
  private readonly postings = new Map<string, Set<string>>();
  private readonly frequencies = new Map<string, FrequencyTable>();

  addDocument(documentId: string, frequencies: FrequencyTable): void {
    if (this.frequencies.has(documentId)) {
      this.removeDocument(documentId);
    }

    for (const term of frequencies.keys()) {
      let documents = this.postings.get(term);
      if (!documents) {
        documents = new Set();
        this.postings.set(term, documents);
      }
      documents.add(documentId);
    }

    this.frequencies.set(documentId, new Map(frequencies));
  }

  removeDocument(documentId: string): boolean {
    const frequencies = this.frequencies.get(documentId);
    if (!frequencies) return false;

    for (const term of frequencies.keys()) {
      const documents = this.postings.get(term);
      if (!documents) {
        this.logger.warn(`Missing posting set for term "${term}" of document ${documentId}`);
        continue;
      }

      documents.delete(documentId);
      if (documents.size === 0) {
        this.postings.delete(term);
      }
    }

    this.frequencies.delete(documentId);
    return true;
  }

  hasDocument(documentId: string): boolean {
    return this.frequencies.has(documentId);
  }

  getPostings(term: string): ReadonlySet<string> | undefined {
    return this.postings.get(term);
  }

  getFrequencies(documentId: string): ReadonlyMap<string, number> | undefined {
    return this.frequencies.get(documentId);
  }

  getTerms(): string[] {
    return Array.from(this.postings.keys());
  }

  size(): number {
    return this.postings.size;
  }

  documentCount(): number {
    return this.frequencies.size;
  }

  clear(): void {
    this.postings.clear();
    this.frequencies.clear();
  }
}
