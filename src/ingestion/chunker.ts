import type { Article, Chunk } from '../types';
import { getDefaultTokenizer, truncateToTokens, type Tokenizer } from './tokenizer';

export const DEFAULT_CHUNK_MAX_TOKENS = 400;

export interface ChunkOptions {
  maxTokens?: number;
  tokenizer?: Tokenizer;
}

function splitIntoWords(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 0);
}

/**
 * Hard-split a single word that exceeds the budget on its own (long URLs, unbroken scripts)
 */
function splitOversizedWord(word: string, maxTokens: number, tokenizer: Tokenizer): string[] {
  const pieces: string[] = [];
  let rest = word;

  while (rest.length > 0) {
    const head = truncateToTokens(rest, maxTokens, tokenizer);
    // Always make progress, even if one character alone is over budget
    const piece = head.length > 0 ? head : rest.slice(0, 1);
    pieces.push(piece);
    rest = rest.slice(piece.length);
  }

  return pieces;
}

/**
 * Split an article's text into passages of at most `maxTokens` tokens.
 *
 * Words are packed greedily and each candidate passage is measured exactly with the
 * tokenizer, so the bound holds for the same tokenizer the embedder uses. Deterministic:
 * the same text always yields the same boundaries.
 */
export function chunkArticle(article: Article, options: ChunkOptions = {}): Chunk[] {
  const maxTokens = options.maxTokens ?? DEFAULT_CHUNK_MAX_TOKENS;
  const tokenizer = options.tokenizer ?? getDefaultTokenizer();

  if (maxTokens < 1) {
    throw new Error(`maxTokens must be positive, got ${maxTokens}`);
  }

  const words = splitIntoWords(article.text);
  const passages: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current.length === 0 ? word : `${current} ${word}`;
    if (tokenizer.countTokens(candidate) <= maxTokens) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      passages.push(current);
      current = '';
    }

    if (tokenizer.countTokens(word) <= maxTokens) {
      current = word;
    } else {
      passages.push(...splitOversizedWord(word, maxTokens, tokenizer));
    }
  }

  if (current.length > 0) {
    passages.push(current);
  }

  return passages.map((text, index) => ({
    id: `${article.id}#${index}`,
    articleId: article.id,
    index,
    text,
    tokenCount: tokenizer.countTokens(text),
  }));
}
