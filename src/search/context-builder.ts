import type { RetrievalResult } from '../types';

const MAX_CONTENT_LENGTH = 2000;

/**
 * Numbered context of the retrieved chunks: only their text plus source and date
 */
export function buildContext(results: RetrievalResult): string {
  return results.map(({ entry }, index) => {
    const content = entry.chunk.text.length > MAX_CONTENT_LENGTH
      ? entry.chunk.text.substring(0, MAX_CONTENT_LENGTH) + '...'
      : entry.chunk.text;

    return `[${index + 1}] Source: ${entry.article.sourceName} | Published: ${entry.article.publishedAt}
${content}`;
  }).join('\n\n---\n\n');
}
