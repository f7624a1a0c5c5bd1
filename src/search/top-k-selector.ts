/**
 * Array.sort style comparator: negative when `a` ranks ahead of `b`.
 */
export type RankComparator<T> = (a: T, b: T) => number;

/**
 * Keeps the best `k` items offered to it in a fixed-size min-heap.
 *
 * The heap root is the worst of the kept items, so a new item only has to
 * beat the root to get in.
 */
export class TopKSelector<T> {
  private readonly heap: T[] = [];

  constructor(
    private readonly k: number,
    private readonly compare: RankComparator<T>,
  ) {}

  offer(item: T): void {
    if (this.k <= 0) return;

    if (this.heap.length < this.k) {
      this.heap.push(item);
      this.siftUp(this.heap.length - 1);
      return;
    }

    const worst = this.heap[0];
    if (worst !== undefined && this.compare(item, worst) < 0) {
      this.heap[0] = item;
      this.siftDown(0);
    }
  }

  get size(): number {
    return this.heap.length;
  }

  /**
   * Kept items, best first
   */
  toSortedArray(): T[] {
    return [...this.heap].sort(this.compare);
  }

  // a sinks below b when a ranks after b
  private worse(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return false;
    return this.compare(a, b) > 0;
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.worse(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;

    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let worst = i;

      if (left < n && this.worse(left, worst)) worst = left;
      if (right < n && this.worse(right, worst)) worst = right;
      if (worst === i) return;

      this.swap(i, worst);
      i = worst;
    }
  }
}

/**
 * Select the best `k` items of an iterable, best first
 */
export function selectTopK<T>(items: Iterable<T>, k: number, compare: RankComparator<T>): T[] {
  const selector = new TopKSelector<T>(k, compare);
  for (const item of items) {
    selector.offer(item);
  }
  return selector.toSortedArray();
}
