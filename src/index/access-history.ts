export const MAX_ACCESS_HISTORY = 100;

/**
 * Per-document access timestamps (epoch ms), newest last, capped per document.
 */
export class AccessHistory {
  private readonly entries = new Map<string, number[]>();

  constructor(private readonly maxEntries: number = MAX_ACCESS_HISTORY) {}

  record(documentId: string, timestamp: number): void {
    let history = this.entries.get(documentId);
    if (!history) {
      history = [];
      this.entries.set(documentId, history);
    }

    history.push(timestamp);
    if (history.length > this.maxEntries) {
      history.splice(0, history.length - this.maxEntries);
    }
  }

  get(documentId: string): readonly number[] {
    return this.entries.get(documentId) ?? [];
  }

  lastAccess(documentId: string): number | undefined {
    const history = this.entries.get(documentId);
    if (!history || history.length === 0) return undefined;
    return Math.max(...history);
  }

  count(documentId: string): number {
    return this.entries.get(documentId)?.length ?? 0;
  }

  delete(documentId: string): boolean {
    return this.entries.delete(documentId);
  }
}
