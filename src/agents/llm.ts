import OpenAI from 'openai';
import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { CallbackHandler } from '@langfuse/langchain';
import type { AppConfig } from '../config';
import { buildUserPrompt } from '../prompts/user-prompt';
import { getDefaultTokenizer, truncateToTokens, type Tokenizer } from '../ingestion/tokenizer';
import { chunkArray } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';

const EMBEDDING_BATCH_SIZE = 100;
const EMBEDDING_MAX_TOKENS = 8000;
export const AGENT_MAX_TOKENS = 1024;

/**
 * Maps text to fixed-dimension vectors. The same instance must serve ingestion and queries.
 */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Single-shot, grounded completion
 */
export interface LanguageModel {
  complete(systemPrompt: string, context: string, question: string): Promise<string>;
}

function appHeaders(appUrl: string): Record<string, string> {
  return {
    'HTTP-Referer': appUrl,
    'X-Title': 'Live News RAG',
  };
}

export function isLangfuseEnabled(): boolean {
  return Boolean(process.env.LANGFUSE_PUBLIC_KEY && process.env.LANGFUSE_SECRET_KEY);
}

/**
 * Create a LangFuse callback handler for tracing completion calls, or null when tracing is off.
 * Credentials are read by the span processor set up in instrumentation.ts.
 */
export function createLangfuseHandler(options?: { sessionId?: string; tags?: string[] }): CallbackHandler | null {
  if (!isLangfuseEnabled()) {
    return null;
  }

  return new CallbackHandler({
    sessionId: options?.sessionId,
    tags: options?.tags || ['live-news-rag'],
  });
}

/**
 * Embeddings through an OpenAI-compatible endpoint (OpenRouter by default)
 */
export class OpenRouterEmbedder implements Embedder {
  private client: OpenAI;
  private tokenizer: Tokenizer;

  constructor(
    private readonly model: string,
    options: { apiKey: string; baseURL: string; appUrl: string; tokenizer?: Tokenizer }
  ) {
    if (!options.apiKey) {
      throw new Error('Model provider API key is required');
    }

    this.tokenizer = options.tokenizer ?? getDefaultTokenizer();

    this.client = new OpenAI({
      baseURL: options.baseURL,
      apiKey: options.apiKey,
      maxRetries: 0,
      defaultHeaders: appHeaders(options.appUrl),
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const stepId = debugLogger.stepStart('EMBED', 'Generating embeddings', {
      model: this.model,
      count: texts.length
    });

    const allEmbeddings: number[][] = [];

    try {
      for (const batch of chunkArray(texts, EMBEDDING_BATCH_SIZE)) {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch.map(text => truncateToTokens(text, EMBEDDING_MAX_TOKENS, this.tokenizer)),
        });

        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        allEmbeddings.push(...ordered.map(item => item.embedding));
      }
    } catch (error) {
      debugLogger.stepError(stepId, 'EMBED', 'Embedding request failed', error);
      throw error;
    }

    if (allEmbeddings.length !== texts.length) {
      const error = new Error(`Expected ${texts.length} embeddings, provider returned ${allEmbeddings.length}`);
      debugLogger.stepError(stepId, 'EMBED', 'Embedding count mismatch', error);
      throw error;
    }

    debugLogger.stepFinish(stepId, {
      count: allEmbeddings.length,
      dimensions: allEmbeddings[0]?.length ?? 0
    });

    return allEmbeddings;
  }
}

/**
 * Chat completion through LangChain's ChatOpenAI pointed at an OpenAI-compatible endpoint
 */
export class OpenRouterChatModel implements LanguageModel {
  private llm: ChatOpenAI;

  constructor(options: {
    apiKey: string;
    baseURL: string;
    model: string;
    temperature: number;
    appUrl: string;
    maxTokens?: number;
  }) {
    this.llm = new ChatOpenAI({
      model: options.model,
      apiKey: options.apiKey,
      configuration: {
        baseURL: options.baseURL,
        defaultHeaders: appHeaders(options.appUrl),
      },
      temperature: options.temperature,
      maxTokens: options.maxTokens ?? AGENT_MAX_TOKENS,
      maxRetries: 0,
      streaming: false,
    });
  }

  async complete(systemPrompt: string, context: string, question: string): Promise<string> {
    const stepId = debugLogger.stepStart('LLM', 'Generating grounded answer', {
      contextLength: context.length
    });

    const handler = createLangfuseHandler({
      sessionId: `chat-${Date.now()}`,
      tags: ['live-news-rag', 'chat-endpoint'],
    });

    try {
      const response = await this.llm.invoke(
        [new SystemMessage(systemPrompt), new HumanMessage(buildUserPrompt(context, question))],
        handler ? { callbacks: [handler] } : undefined
      );

      if (typeof response.content !== 'string') {
        throw new Error('Model returned non-text content');
      }

      const text = response.content.trim();
      debugLogger.stepFinish(stepId, { answerLength: text.length });
      return text;
    } catch (error) {
      debugLogger.stepError(stepId, 'LLM', 'Completion failed', error);
      throw error;
    }
  }
}

export function createEmbedder(config: AppConfig['llm']): OpenRouterEmbedder {
  return new OpenRouterEmbedder(config.embeddingModel, {
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    appUrl: config.appUrl,
  });
}

export function createLanguageModel(config: AppConfig['llm']): OpenRouterChatModel {
  return new OpenRouterChatModel({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    model: config.model,
    temperature: config.temperature,
    appUrl: config.appUrl,
  });
}
