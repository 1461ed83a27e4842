import type { Answer, RetrievalResult } from '../types';
import type { Embedder, LanguageModel } from '../agents/llm';
import type { VectorIndex } from './vector-index';
import { buildContext } from './context-builder';
import { buildSystemPrompt, NO_CONTEXT_ANSWER } from '../prompts/system-prompt';
import { ModelInvocationError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export const DEFAULT_TOP_K = 5;

export interface QueryEngineOptions {
  embedder: Embedder;
  index: VectorIndex;
  llm: LanguageModel;
  topK?: number;
  categories?: string[];
  now?: () => Date;
}

export interface Answerer {
  answer(questionText: string): Promise<Answer>;
}

/**
 * Embeds a question, retrieves the top-K chunks from the live index and grounds one
 * completion in them. An empty retrieval returns the fixed no-context answer without
 * calling the language model.
 */
export class QueryEngine implements Answerer {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly llm: LanguageModel;
  private readonly topK: number;
  private readonly categories: string[];
  private readonly now: () => Date;

  constructor(options: QueryEngineOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.llm = options.llm;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.categories = options.categories ?? [];
    this.now = options.now ?? (() => new Date());
  }

  async answer(questionText: string): Promise<Answer> {
    const stepId = debugLogger.stepStart('QUERY', 'Answering question', {
      questionLength: questionText.length,
      topK: this.topK
    });

    const retrieved = await this.retrieve(questionText);

    if (retrieved.length === 0) {
      debugLogger.stepFinish(stepId, { retrieved: 0, fallback: true });
      return {
        text: NO_CONTEXT_ANSWER,
        references: [],
        metadata: { retrievedDocCount: 0 },
      };
    }

    const systemPrompt = buildSystemPrompt(this.now(), this.categories);
    const context = buildContext(retrieved);

    let text: string;
    try {
      text = await this.llm.complete(systemPrompt, context, questionText);
    } catch (error) {
      debugLogger.stepError(stepId, 'QUERY', 'Completion failed', error);
      throw new ModelInvocationError('completion', error);
    }

    debugLogger.stepFinish(stepId, {
      retrieved: retrieved.length,
      sources: retrieved.map(r => r.entry.article.sourceName)
    });

    return {
      text,
      references: retrieved.map(({ entry }) => ({
        source: entry.article.sourceName,
        date: entry.article.publishedAt,
        url: entry.article.url,
      })),
      metadata: { retrievedDocCount: retrieved.length },
    };
  }

  /**
   * Top-K chunks for a question, most similar first
   */
  async retrieve(questionText: string): Promise<RetrievalResult> {
    // An empty index answers without an embedding call
    if (this.index.size() === 0) {
      return [];
    }

    let queryVector: number[] | undefined;
    try {
      [queryVector] = await this.embedder.embed([questionText]);
    } catch (error) {
      throw new ModelInvocationError('embedding', error);
    }

    if (!queryVector) {
      throw new ModelInvocationError('embedding', new Error('Embedder returned no vector for the question'));
    }

    return this.index.search(queryVector, this.topK);
  }
}
