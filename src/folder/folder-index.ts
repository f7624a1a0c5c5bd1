import { FolderSummary } from './interfaces/folder.interface';

export const ROOT_PATH = '/';
export const ROOT_NAME = 'root';

export class FolderNode {
  readonly children = new Map<string, FolderNode>();
  readonly documentIds = new Set<string>();
  readonly createdAt = new Date();

  constructor(
    readonly name: string,
    public parent: FolderNode | null,
  ) {}

  get path(): string {
    if (!this.parent) {
      return ROOT_PATH;
    }
    const parentPath = this.parent.path;
    return parentPath === ROOT_PATH ? `/${this.name}` : `${parentPath}/${this.name}`;
  }

  summarize(): FolderSummary {
    return {
      path: this.path,
      name: this.name,
      memberCount: this.documentIds.size,
      childCount: this.children.size,
    };
  }
}

/**
 * Canonical form of a folder path: "/" or "/a/b" with empty segments dropped
 */
export function normalizePath(path: string): string {
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return segments.length === 0 ? ROOT_PATH : `/${segments.join('/')}`;
}

function segmentsOf(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Folder tree with O(1) lookup by path.
 *
 * Every live node is registered under its normalized path; deleting a folder
 * unregisters its whole subtree.
 */
export class FolderIndex {
  readonly root = new FolderNode(ROOT_NAME, null);
  private readonly foldersByPath = new Map<string, FolderNode>([[ROOT_PATH, this.root]]);

  /**
   * Create a folder and any missing ancestors. Idempotent.
   */
  addFolder(path: string): FolderNode {
    let node = this.root;
    for (const segment of segmentsOf(path)) {
      let child = node.children.get(segment);
      if (!child) {
        child = new FolderNode(segment, node);
        node.children.set(segment, child);
        this.foldersByPath.set(child.path, child);
      }
      node = child;
    }
    return node;
  }

  getFolder(path: string): FolderNode | undefined {
    return this.foldersByPath.get(normalizePath(path));
  }

  /**
   * Detach a folder and unregister it with all descendants.
   * Member documents are left as they are.
   * @returns false for the root or an unknown path
   */
  deleteFolder(path: string): boolean {
    const node = this.getFolder(path);
    if (!node || !node.parent) {
      return false;
    }

    node.parent.children.delete(node.name);
    const stack: FolderNode[] = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      this.foldersByPath.delete(current.path);
      stack.push(...current.children.values());
    }
    node.parent = null;
    return true;
  }

  addDocumentToFolder(path: string, documentId: string): boolean {
    const node = this.getFolder(path);
    if (!node) return false;
    node.documentIds.add(documentId);
    return true;
  }

  removeDocumentFromFolder(path: string, documentId: string): boolean {
    const node = this.getFolder(path);
    if (!node) return false;
    node.documentIds.delete(documentId);
    return true;
  }

  documentsInFolder(path: string): Set<string> {
    return new Set(this.getFolder(path)?.documentIds);
  }

  /**
   * Pre-order walk, children in insertion order
   */
  traverseDepthFirst(): FolderSummary[] {
    const result: FolderSummary[] = [];
    const stack: FolderNode[] = [this.root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      result.push(node.summarize());
      stack.push(...[...node.children.values()].reverse());
    }
    return result;
  }

  /**
   * Level-order walk, children in insertion order
   */
  traverseBreadthFirst(): FolderSummary[] {
    const result: FolderSummary[] = [];
    const queue: FolderNode[] = [this.root];

    for (let i = 0; i < queue.length; i++) {
      const node = queue[i];
      result.push(node.summarize());
      queue.push(...node.children.values());
    }
    return result;
  }

  get size(): number {
    return this.foldersByPath.size;
  }
}
