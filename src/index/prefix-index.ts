interface PrefixNode {
  children: Map<string, PrefixNode>;
  terminal: boolean;
  count: number;
  words: Set<string>;
}

function createNode(): PrefixNode {
  return { children: new Map(), terminal: false, count: 0, words: new Set() };
}

function byCodePoint(a: string, b: string): number {
  return (a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);
}

/**
 * Character trie over indexed tokens, used for autocomplete.
 *
 * Tokens are case-folded on the way in and never removed.
 */
export class PrefixIndex {
  private readonly root: PrefixNode = createNode();
  private distinctWords = 0;

  insert(token: string): void {
    if (!token) return;

    const word = token.toLowerCase();
    let node = this.root;
    for (const ch of word) {
      let next = node.children.get(ch);
      if (!next) {
        next = createNode();
        node.children.set(ch, next);
      }
      node = next;
    }

    if (!node.terminal) {
      node.terminal = true;
      this.distinctWords++;
    }
    node.count++;
    node.words.add(word);
  }

  has(token: string): boolean {
    if (!token) return false;
    return this.findNode(token.toLowerCase())?.terminal ?? false;
  }

  /**
   * How many times a token has been inserted
   */
  count(token: string): number {
    if (!token) return 0;
    return this.findNode(token.toLowerCase())?.count ?? 0;
  }

  /**
   * Tokens starting with `prefix`, in alphabetical (code point) order, at most `limit` of them
   */
  autocomplete(prefix: string, limit: number = 10): string[] {
    if (!prefix || limit <= 0) return [];

    const node = this.findNode(prefix.toLowerCase());
    if (!node) return [];

    return this.collect(node, limit);
  }

  /**
   * Every stored token, in the same order autocomplete uses
   */
  words(): string[] {
    return this.collect(this.root, Number.POSITIVE_INFINITY);
  }

  get size(): number {
    return this.distinctWords;
  }

  private findNode(word: string): PrefixNode | undefined {
    let node: PrefixNode | undefined = this.root;
    for (const ch of word) {
      node = node.children.get(ch);
      if (!node) return undefined;
    }
    return node;
  }

  // Pre-order walk: a node's own words come before anything in its subtree.
  private collect(start: PrefixNode, limit: number): string[] {
    const results: string[] = [];
    const stack: PrefixNode[] = [start];

    while (stack.length > 0 && results.length < limit) {
      const node = stack.pop();
      if (!node) break;

      if (node.terminal) {
        for (const word of node.words) {
          if (results.length >= limit) break;
          results.push(word);
        }
      }

      // reverse order so the smallest character is popped first
      const keys = Array.from(node.children.keys()).sort(byCodePoint).reverse();
      for (const key of keys) {
        const child = node.children.get(key);
        if (child) stack.push(child);
      }
    }

    return results;
  }
}
