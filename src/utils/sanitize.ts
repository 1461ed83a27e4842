/**
 * Input sanitization for text that crosses a trust boundary:
 * - user prompts headed for the language model (prompt injection)
 * - provider-supplied titles/descriptions (HTML fragments)
 * - anything written to the logs (log injection)
 */

/**
 * Inputs longer than this are rejected before regex evaluation (ReDoS protection)
 */
const MAX_REGEX_INPUT_LENGTH = 10000;

function safeRegexTest(pattern: RegExp, input: string): boolean {
  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return true;
  }

  // Reset lastIndex for global regexes
  pattern.lastIndex = 0;
  return pattern.test(input);
}

const PROMPT_INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/gi,
  /disregard\s+(all\s+)?(previous|above|prior)/gi,
  /forget\s+(all\s+)?(previous|above|prior)/gi,
  /you\s+are\s+now\s+/gi,
  /new\s+instructions?:/gi,
  /\[\s*INST\s*\]/gi,
  /\[\s*\/INST\s*\]/gi,
  /<\|im_start\|>/gi,
  /<\|im_end\|>/gi,
  /<<SYS>>/gi,
  /<\/SYS>/gi,
];

const LOG_DANGEROUS_CHARS = /[\r\n\x00-\x08\x0b\x0c\x0e-\x1f]/g;

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#039;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
  '&#x27;': "'",
  '&#x2F;': '/',
};

/**
 * Neutralize prompt-injection markers in a user question.
 * `suspicious` reports whether any known pattern was present.
 */
export function sanitizeForLLM(input: string): { sanitized: string; suspicious: boolean } {
  if (!input) {
    return { sanitized: '', suspicious: false };
  }

  if (input.length > MAX_REGEX_INPUT_LENGTH) {
    return { sanitized: input.substring(0, 500), suspicious: true };
  }

  const suspicious = PROMPT_INJECTION_PATTERNS.some(pattern => safeRegexTest(pattern, input));

  const sanitized = input
    .replace(/\[\s*(system|user|assistant)\s*\]/gi, '')
    .replace(/```\s*(system|prompt|instruction)/gi, '```')
    .replace(/</g, '＜')
    .replace(/>/g, '＞')
    .replace(/\0/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return { sanitized, suspicious };
}

/**
 * Single-line, bounded rendering of untrusted text for the logs
 */
export function sanitizeForLog(input: string): string {
  if (!input) {
    return '';
  }

  return input
    .replace(LOG_DANGEROUS_CHARS, ' ')
    .substring(0, 1000);
}

/**
 * Strip tags and decode common entities from provider text, normalizing whitespace
 */
export function stripHtml(html: string): string {
  if (!html) {
    return '';
  }

  let text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<[^>]*>/g, ' ');

  for (const [entity, char] of Object.entries(HTML_ENTITIES)) {
    text = text.replace(new RegExp(entity, 'gi'), char);
  }

  // Decode numeric entities, printable ASCII only
  text = text.replace(/&#(\d+);/g, (_, code: string) => {
    const num = parseInt(code, 10);
    return num >= 32 && num <= 126 ? String.fromCharCode(num) : '';
  });

  return text.replace(/\s+/g, ' ').trim();
}
