export interface Article {
  /** Identity of the article: its canonical source URL */
  id: string;
  url: string;
  title: string;
  description: string;
  /** Title joined with the description, the text that gets chunked and embedded */
  text: string;
  publishedAt: string;
  sourceName: string;
  category: string;
}

/**
 * Answer-rendering metadata of an article, shared by reference between all of its index entries
 */
export type ArticleRef = Pick<Article, 'id' | 'url' | 'title' | 'sourceName' | 'publishedAt' | 'category'>;

export interface Chunk {
  id: string;
  articleId: string;
  index: number;
  text: string;
  tokenCount: number;
}

export interface IndexEntryInput {
  chunkId: string;
  embedding: number[];
  chunk: Chunk;
  article: ArticleRef;
}

export interface IndexEntry extends IndexEntryInput {
  insertedAt: Date;
  /** Monotonic insertion counter, used only to break similarity ties */
  sequence: number;
}

export interface RetrievedChunk {
  entry: IndexEntry;
  score: number;
}

export type RetrievalResult = RetrievedChunk[];

export interface Reference {
  source: string;
  date: string;
  url: string;
}

export interface Answer {
  text: string;
  references: Reference[];
  metadata: {
    retrievedDocCount: number;
  };
}

export interface CategoryPollStats {
  category: string;
  fetched: number;
  emitted: number;
  error?: string;
}

export interface PollCycleStats {
  categories: CategoryPollStats[];
  emitted: number;
  durationMs: number;
}

export interface IngestResult {
  articleId: string;
  chunks: number;
}
