import { ConfigurationError } from '../common/errors/configuration.error';

class LRUNode<V> {
  constructor(
    public key: string,
    public value: V | undefined,
    public prev: LRUNode<V> | null = null,
    public next: LRUNode<V> | null = null,
  ) {}
}

/**
 * Fixed-capacity LRU cache.
 *
 * Entries live in a doubly linked list between two sentinels: the node after `head`
 * is the most recently used, the node before `tail` is the next to be evicted.
 * A map from key to node keeps every operation O(1).
 */
export class BoundedResultCache<V> {
  private readonly head = new LRUNode<V>('', undefined);
  private readonly tail = new LRUNode<V>('', undefined);
  private readonly nodes = new Map<string, LRUNode<V>>();
  private readonly maxSize: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError(`Cache capacity must be a positive integer, got ${capacity}`);
    }

    this.maxSize = capacity;
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  get(key: string): V | undefined {
    const node = this.nodes.get(key);
    if (!node) return undefined;

    this.moveToFront(node);
    return node.value;
  }

  put(key: string, value: V): void {
    const existing = this.nodes.get(key);
    if (existing) {
      existing.value = value;
      this.moveToFront(existing);
      return;
    }

    if (this.nodes.size >= this.maxSize) {
      this.evictLeastRecent();
    }

    const node = new LRUNode(key, value);
    this.nodes.set(key, node);
    this.addToFront(node);
  }

  /**
   * Membership check that leaves the recency order untouched
   */
  has(key: string): boolean {
    return this.nodes.has(key);
  }

  clear(): void {
    for (const node of this.nodes.values()) {
      node.prev = null;
      node.next = null;
    }
    this.nodes.clear();
    this.head.next = this.tail;
    this.tail.prev = this.head;
  }

  get size(): number {
    return this.nodes.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /**
   * Keys from most to least recently used
   */
  keys(): string[] {
    const keys: string[] = [];
    for (let node = this.head.next; node && node !== this.tail; node = node.next) {
      keys.push(node.key);
    }
    return keys;
  }

  private moveToFront(node: LRUNode<V>): void {
    this.unlink(node);
    this.addToFront(node);
  }

  private addToFront(node: LRUNode<V>): void {
    const first = this.head.next;
    node.prev = this.head;
    node.next = first;
    if (first) first.prev = node;
    this.head.next = node;
  }

  private unlink(node: LRUNode<V>): void {
    if (node.prev) node.prev.next = node.next;
    if (node.next) node.next.prev = node.prev;
    node.prev = null;
    node.next = null;
  }

  private evictLeastRecent(): void {
    const last = this.tail.prev;
    if (!last || last === this.head) return;

    this.unlink(last);
    this.nodes.delete(last.key);
  }
}
