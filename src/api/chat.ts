import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ChatRequestSchema, type ChatResponse } from '../schemas';
import type { Answerer } from '../search/query-engine';
import { RequestTimeoutError, ValidationError } from '../utils/errors';
import { sanitizeForLLM, sanitizeForLog } from '../utils/sanitize';
import { withTimeout } from '../utils/time';
import { debugLogger } from '../utils/debug-logger';

export interface ChatHandlerOptions {
  answerer: Answerer;
  requestTimeoutMs: number;
}

/**
 * POST /v1/chat
 */
export function createChatHandler(options: ChatHandlerOptions): RequestHandler {
  const { answerer, requestTimeoutMs } = options;

  return async function handleChat(req: Request, res: Response, next: NextFunction): Promise<void> {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? 'Invalid request body';
      next(new ValidationError(message));
      return;
    }

    const { sanitized, suspicious } = sanitizeForLLM(parsed.data.prompt);
    if (suspicious) {
      console.warn(`⚠️  Suspicious prompt received: "${sanitizeForLog(parsed.data.prompt).substring(0, 100)}"`);
    }

    if (!sanitized) {
      next(new ValidationError('prompt cannot be empty'));
      return;
    }

    const stepId = debugLogger.stepStart('CHAT', 'Handling chat request', {
      promptLength: sanitized.length,
      suspicious
    });

    try {
      const answer = await withTimeout(
        answerer.answer(sanitized),
        requestTimeoutMs,
        () => new RequestTimeoutError(requestTimeoutMs)
      );

      const body: ChatResponse = {
        answer: answer.text,
        references: answer.references,
        metadata: { retrieved_docs: answer.metadata.retrievedDocCount },
      };

      debugLogger.stepFinish(stepId, {
        retrievedDocs: answer.metadata.retrievedDocCount,
        answerLength: answer.text.length
      });

      res.json(body);
    } catch (error) {
      debugLogger.stepError(stepId, 'CHAT', 'Chat request failed', error);
      next(error);
    }
  };
}
