import dotenv from 'dotenv';

// Load env vars before anything else
dotenv.config();

import { LangfuseSpanProcessor } from '@langfuse/otel';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { setLangfuseTracerProvider } from '@langfuse/tracing';
import { isLangfuseEnabled } from './agents/llm';

const DEFAULT_LANGFUSE_HOST = 'https://us.cloud.langfuse.com';

/**
 * Langfuse tracing of completion calls. The @langfuse/langchain CallbackHandler emits
 * OpenTelemetry spans; they reach Langfuse only through a TracerProvider carrying the
 * LangfuseSpanProcessor. The provider is Langfuse-specific, not the global one.
 * Without keys nothing is registered and the handler is never created.
 */
export const spanProcessor: LangfuseSpanProcessor | null = isLangfuseEnabled()
  ? new LangfuseSpanProcessor({
      publicKey: process.env.LANGFUSE_PUBLIC_KEY,
      secretKey: process.env.LANGFUSE_SECRET_KEY,
      baseUrl: process.env.LANGFUSE_HOST || DEFAULT_LANGFUSE_HOST,
    })
  : null;

if (spanProcessor) {
  const provider = new NodeTracerProvider({
    spanProcessors: [spanProcessor],
  });

  setLangfuseTracerProvider(provider);

  console.log('LangFuse: TracerProvider initialized with LangfuseSpanProcessor');
  console.log('LangFuse config:', {
    host: process.env.LANGFUSE_HOST || DEFAULT_LANGFUSE_HOST,
  });
}

/**
 * Send buffered spans before the process exits
 */
export async function flushTraces(): Promise<void> {
  if (!spanProcessor) return;

  try {
    await spanProcessor.forceFlush();
  } catch (error) {
    console.warn('LangFuse: failed to flush traces:', error instanceof Error ? error.message : String(error));
  }
}
