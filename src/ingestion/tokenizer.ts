import { get_encoding, type Tiktoken } from 'tiktoken';

/**
 * Token counting shared by the chunker and the embedder's input truncation,
 * so chunk length guarantees hold at embedding time.
 */
export interface Tokenizer {
  countTokens(text: string): number;
}

export class TiktokenTokenizer implements Tokenizer {
  private encoding: Tiktoken | null = null;

  countTokens(text: string): number {
    if (text.length === 0) return 0;
    return this.getEncoding().encode(text).length;
  }

  free(): void {
    this.encoding?.free();
    this.encoding = null;
  }

  private getEncoding(): Tiktoken {
    if (!this.encoding) {
      this.encoding = get_encoding('cl100k_base');
    }
    return this.encoding;
  }
}

let defaultTokenizer: TiktokenTokenizer | null = null;

export function getDefaultTokenizer(): Tokenizer {
  if (!defaultTokenizer) {
    defaultTokenizer = new TiktokenTokenizer();
  }
  return defaultTokenizer;
}

/**
 * Longest prefix of `text` whose token count fits `maxTokens`, by binary search on length
 */
export function truncateToTokens(text: string, maxTokens: number, tokenizer: Tokenizer): string {
  if (tokenizer.countTokens(text) <= maxTokens) {
    return text;
  }

  let low = 0;
  let high = text.length;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (tokenizer.countTokens(text.slice(0, mid)) <= maxTokens) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return text.slice(0, low);
}
