import type { IndexEntry, IndexEntryInput, RetrievalResult } from '../types';
import { DimensionMismatchError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { cosineWithNorms, vectorNorm } from './similarity';

/**
 * Insert/search contract shared by index implementations (brute force today, approximate later).
 */
export interface VectorIndex {
  insert(entry: IndexEntryInput): IndexEntry;
  /**
   * Up to `k` entries by descending cosine similarity, ties broken by insertion order.
   * Empty on an empty index.
   */
  search(queryVector: number[], k: number): RetrievalResult;
  /** Remove every entry matching the predicate; returns how many were removed */
  evict(predicate: (entry: IndexEntry) => boolean): number;
  size(): number;
  /** Dimensionality shared by all entries, null until fixed */
  dimensions(): number | null;
}

interface StoredEntry {
  entry: IndexEntry;
  norm: number;
}

/**
 * Exhaustive cosine kNN, O(n·d) per query.
 *
 * Insert and search run synchronously on the event loop, so a search always sees a
 * consistent snapshot and never a partially built entry. Entries are frozen on insert.
 */
export class BruteForceVectorIndex implements VectorIndex {
  private entries: StoredEntry[] = [];
  private sequence = 0;
  private dimension: number | null;

  constructor(options: { dimensions?: number } = {}) {
    this.dimension = options.dimensions ?? null;
  }

  insert(input: IndexEntryInput): IndexEntry {
    const actual = input.embedding.length;
    if (actual === 0) {
      throw new Error(`Empty embedding for chunk ${input.chunkId}`);
    }
    if (this.dimension === null) {
      this.dimension = actual;
    } else if (actual !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, actual);
    }

    const entry: IndexEntry = Object.freeze({
      chunkId: input.chunkId,
      embedding: [...input.embedding],
      chunk: Object.freeze({ ...input.chunk }),
      article: input.article,
      insertedAt: new Date(),
      sequence: this.sequence++,
    });

    this.entries.push({ entry, norm: vectorNorm(entry.embedding) });
    return entry;
  }

  search(queryVector: number[], k: number): RetrievalResult {
    if (this.entries.length === 0 || k <= 0) {
      return [];
    }
    if (this.dimension !== null && queryVector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, queryVector.length);
    }

    const stepId = debugLogger.stepStart('SEARCH', 'Brute-force cosine search', {
      indexSize: this.entries.length,
      k
    });

    const queryNorm = vectorNorm(queryVector);
    const scored = this.entries.map(({ entry, norm }) => ({
      entry,
      score: cosineWithNorms(queryVector, queryNorm, entry.embedding, norm),
    }));

    scored.sort((a, b) => b.score - a.score || a.entry.sequence - b.entry.sequence);
    const results = scored.slice(0, Math.min(k, scored.length));

    debugLogger.stepFinish(stepId, {
      returned: results.length,
      topScores: results.map(r => Number(r.score.toFixed(3)))
    });

    return results;
  }

  evict(predicate: (entry: IndexEntry) => boolean): number {
    const before = this.entries.length;
    this.entries = this.entries.filter(stored => !predicate(stored.entry));
    return before - this.entries.length;
  }

  size(): number {
    return this.entries.length;
  }

  dimensions(): number | null {
    return this.dimension;
  }
}
