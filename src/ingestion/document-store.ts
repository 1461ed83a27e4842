import type { Article, ArticleRef, IngestResult } from '../types';
import type { Embedder } from '../agents/llm';
import type { VectorIndex } from '../search/vector-index';
import { MetricsTracker } from '../jobs/metrics-tracker';
import { chunkArticle, type ChunkOptions } from './chunker';
import { debugLogger } from '../utils/debug-logger';
import { DimensionMismatchError, errorMessage } from '../utils/errors';

export interface DocumentStoreOptions {
  embedder: Embedder;
  index: VectorIndex;
  chunking?: ChunkOptions;
  metrics?: MetricsTracker;
}

function toArticleRef(article: Article): ArticleRef {
  return Object.freeze({
    id: article.id,
    url: article.url,
    title: article.title,
    sourceName: article.sourceName,
    publishedAt: article.publishedAt,
    category: article.category,
  });
}

/**
 * Chunks, embeds and indexes incoming articles. The only writer to the vector index.
 */
export class DocumentStore {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly chunking: ChunkOptions;
  private readonly metrics?: MetricsTracker;

  constructor(options: DocumentStoreOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.chunking = options.chunking ?? {};
    this.metrics = options.metrics;
  }

  async ingest(article: Article): Promise<IngestResult> {
    const stepId = debugLogger.stepStart('INGESTION', `Indexing article: ${article.title.substring(0, 60)}`, {
      url: article.url,
      category: article.category
    });

    const chunks = chunkArticle(article, this.chunking);
    if (chunks.length === 0) {
      debugLogger.stepFinish(stepId, { chunks: 0 });
      return { articleId: article.id, chunks: 0 };
    }

    let embeddings: number[][];
    try {
      embeddings = await this.embedder.embed(chunks.map(chunk => chunk.text));
    } catch (error) {
      debugLogger.stepError(stepId, 'INGESTION', 'Embedding failed', error);
      throw error;
    }

    if (embeddings.length !== chunks.length) {
      const error = new Error(`Embedder returned ${embeddings.length} vectors for ${chunks.length} chunks`);
      debugLogger.stepError(stepId, 'INGESTION', 'Embedding count mismatch', error);
      throw error;
    }

    const mismatch = this.findDimensionMismatch(embeddings);
    if (mismatch) {
      debugLogger.stepError(stepId, 'INGESTION', 'Embedding dimension mismatch', mismatch);
      throw mismatch;
    }

    // Every vector is checked before the first insert, so an article is indexed whole or not at all
    const articleRef = toArticleRef(article);
    chunks.forEach((chunk, i) => {
      this.index.insert({
        chunkId: chunk.id,
        embedding: embeddings[i],
        chunk,
        article: articleRef,
      });
    });

    this.metrics?.recordArticleIndexed(chunks.length);
    debugLogger.stepFinish(stepId, { chunks: chunks.length, indexSize: this.index.size() });

    return { articleId: article.id, chunks: chunks.length };
  }

  private findDimensionMismatch(embeddings: number[][]): DimensionMismatchError | null {
    const expected = this.index.dimensions() ?? embeddings[0]?.length ?? 0;
    for (const embedding of embeddings) {
      if (embedding.length === 0 || embedding.length !== expected) {
        return new DimensionMismatchError(expected, embedding.length);
      }
    }
    return null;
  }

  /**
   * Drain a stream of articles until it ends. A failing article is logged and skipped.
   */
  async consume(articles: AsyncIterable<Article>): Promise<void> {
    for await (const article of articles) {
      try {
        await this.ingest(article);
      } catch (error) {
        this.metrics?.recordArticleFailed();
        console.error(`❌ Failed to index article ${article.url}: ${errorMessage(error).substring(0, 200)}`);
      }
    }
  }

  /**
   * Evict entries indexed before the cutoff; returns how many were removed
   */
  pruneOlderThan(cutoff: Date): number {
    const removed = this.index.evict(entry => entry.insertedAt.getTime() < cutoff.getTime());
    if (removed > 0) {
      this.metrics?.recordEviction(removed);
      debugLogger.info('RETENTION', 'Evicted expired chunks', {
        removed,
        cutoff: cutoff.toISOString(),
        remaining: this.index.size()
      });
    }
    return removed;
  }

  size(): number {
    return this.index.size();
  }
}
