/**
 * Per-document signals needed to score a candidate
 */
export interface ScoringContext {
  /**
   * Token frequency table of the candidate document
   */
  frequencies?: ReadonlyMap<string, number>;

  /**
   * Most recent recorded access (epoch ms), if any
   */
  lastAccess?: number;

  /**
   * Length of the document's access history
   */
  accessCount: number;

  /**
   * Current time (epoch ms)
   */
  now: number;
}

/**
 * Weights of the linear relevance formula
 */
export interface RelevanceWeights {
  termFrequency: number;
  recency: number;
  usage: number;
}

/**
 * Interface for scoring algorithms
 */
export interface Scorer {
  /**
   * Score a candidate document for the given query tokens
   */
  score(queryTerms: readonly string[], context: ScoringContext): number;

  /**
   * Get the name of the scoring algorithm
   */
  getName(): string;

  /**
   * Get the current scoring parameters
   */
  getParameters(): RelevanceWeights;
}
