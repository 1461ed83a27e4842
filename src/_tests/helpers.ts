import type { Article, ArticleRef, Chunk, IndexEntryInput } from '../types';
import type { Embedder, LanguageModel } from '../agents/llm';
import type { Tokenizer } from '../ingestion/tokenizer';

export function makeArticle(overrides: Partial<Article> = {}): Article {
  const title = overrides.title ?? 'Test headline';
  const description = overrides.description ?? 'Test description';
  const url = overrides.url ?? 'https://news.test/a';
  return {
    id: url,
    url,
    title,
    description,
    text: `${title}. ${description}`,
    publishedAt: '2026-01-18T12:00:00Z',
    sourceName: 'Test Source',
    category: 'technology',
    ...overrides,
  };
}

export function makeEntry(chunkId: string, embedding: number[], article: Partial<ArticleRef> = {}): IndexEntryInput {
  const ref: ArticleRef = {
    id: `https://news.test/${chunkId}`,
    url: `https://news.test/${chunkId}`,
    title: chunkId,
    sourceName: 'Test Source',
    publishedAt: '2026-01-18T12:00:00Z',
    category: 'technology',
    ...article,
  };
  const chunk: Chunk = { id: chunkId, articleId: ref.id, index: 0, text: chunkId, tokenCount: 1 };
  return { chunkId, embedding, chunk, article: ref };
}

/** One token per character */
export const charTokenizer: Tokenizer = { countTokens: text => text.length };

/** One token per whitespace-separated word */
export const wordTokenizer: Tokenizer = {
  countTokens: text => text.split(/\s+/).filter(w => w.length > 0).length,
};

export const KEYWORDS = ['ai', 'breakthrough', 'market', 'crypto', 'football'];

/**
 * Bag-of-keywords embedder: one dimension per keyword, counting word occurrences
 */
export class KeywordEmbedder implements Embedder {
  calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map(text => {
      const words = text.toLowerCase().split(/[^a-z0-9]+/);
      return KEYWORDS.map(keyword => words.filter(w => w === keyword).length);
    });
  }
}

export class FailingEmbedder implements Embedder {
  async embed(): Promise<number[][]> {
    throw new Error('embedding provider unavailable');
  }
}

export class StubLanguageModel implements LanguageModel {
  calls: Array<{ systemPrompt: string; context: string; question: string }> = [];

  constructor(private readonly reply: string | Error = 'Stub answer') {}

  async complete(systemPrompt: string, context: string, question: string): Promise<string> {
    this.calls.push({ systemPrompt, context, question });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}
