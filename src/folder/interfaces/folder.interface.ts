/**
 * Flat view of a folder, as produced by the traversals
 */
export interface FolderSummary {
  path: string;
  name: string;
  memberCount: number;
  childCount: number;
}

export type TraversalOrder = 'dfs' | 'bfs';
