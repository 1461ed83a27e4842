import { ChatResponseSchema, type ChatResponse } from '../schemas';
import type { FetchFn } from '../ingestion/news-connector';
import { errorMessage } from '../utils/errors';

export const DEFAULT_CLIENT_TIMEOUT_MS = 30_000;
const HEALTH_TIMEOUT_MS = 2_000;

export type AskResult =
  | { kind: 'ok'; response: ChatResponse }
  | { kind: 'unreachable'; message: string }
  | { kind: 'error-status'; status: number; body: string }
  | { kind: 'timeout'; timeoutMs: number };

export type BackendHealth = 'online' | 'degraded' | 'offline';

export interface NewsClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Typed client for the chat API, used by dashboards and scripts.
 * Failures come back as values; `ask` and `health` do not throw.
 */
export class NewsClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: NewsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async ask(prompt: string): Promise<AskResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(`${this.baseUrl}/v1/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ prompt }),
        signal: controller.signal,
      });

      const body = await response.text();

      if (response.status !== 200) {
        return { kind: 'error-status', status: response.status, body };
      }

      const parsed = ChatResponseSchema.safeParse(parseJson(body));
      if (!parsed.success) {
        return { kind: 'error-status', status: response.status, body };
      }

      return { kind: 'ok', response: parsed.data };
    } catch (error) {
      if (controller.signal.aborted) {
        return { kind: 'timeout', timeoutMs: this.timeoutMs };
      }
      return { kind: 'unreachable', message: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  async health(): Promise<BackendHealth> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), HEALTH_TIMEOUT_MS);

    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`, { signal: controller.signal });
      return response.status === 200 ? 'online' : 'degraded';
    } catch {
      return 'offline';
    } finally {
      clearTimeout(timer);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
