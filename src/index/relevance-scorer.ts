import { RelevanceWeights, Scorer, ScoringContext } from './interfaces/scoring.interface';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

export const RELEVANCE_WEIGHTS: Readonly<RelevanceWeights> = Object.freeze({
  termFrequency: 0.5,
  recency: 0.3,
  usage: 0.2,
});

/**
 * Accesses needed for a full usage score
 */
export const USAGE_SATURATION = 10;

/**
 * Fixed linear blend of term frequency, access recency and access count.
 *
 * relevance = 0.5 * avgTF + 0.3 * recency + 0.2 * usage
 */
export class RelevanceScorer implements Scorer {
  score(queryTerms: readonly string[], context: ScoringContext): number {
    const tf = this.averageTermFrequency(queryTerms, context.frequencies);
    const recency = this.recency(context.lastAccess, context.now);
    const usage = this.usage(context.accessCount);

    return (
      RELEVANCE_WEIGHTS.termFrequency * tf +
      RELEVANCE_WEIGHTS.recency * recency +
      RELEVANCE_WEIGHTS.usage * usage
    );
  }

  /**
   * Mean over query tokens (duplicates included) of count / total tokens in the document
   */
  averageTermFrequency(
    queryTerms: readonly string[],
    frequencies: ReadonlyMap<string, number> | undefined,
  ): number {
    if (queryTerms.length === 0 || !frequencies) {
      return 0;
    }

    let total = 0;
    for (const count of frequencies.values()) {
      total += count;
    }
    if (total === 0) {
      return 0;
    }

    let sum = 0;
    for (const term of queryTerms) {
      sum += (frequencies.get(term) ?? 0) / total;
    }
    return sum / queryTerms.length;
  }

  /**
   * Step decay on time since the last access
   */
  recency(lastAccess: number | undefined, now: number): number {
    if (lastAccess === undefined) {
      return 0;
    }

    const elapsed = now - lastAccess;
    if (elapsed < HOUR_MS) return 1.0;
    if (elapsed < DAY_MS) return 0.7;
    if (elapsed < WEEK_MS) return 0.4;
    return 0.1;
  }

  usage(accessCount: number): number {
    return Math.min(1.0, accessCount / USAGE_SATURATION);
  }

  getName(): string {
    return 'relevance';
  }

  getParameters(): RelevanceWeights {
    return { ...RELEVANCE_WEIGHTS };
  }
}
