import { flushTraces } from './instrumentation'; // Must be first - loads .env and sets up LangFuse
import type { Server } from 'http';
import { loadConfig, type AppConfig } from './config';
import { createApp } from './app';
import { ConfigurationError } from './utils/errors';
import { SeenSet } from './ingestion/seen-set';
import { NewsConnector } from './ingestion/news-connector';
import { DocumentStore } from './ingestion/document-store';
import { BruteForceVectorIndex, QueryEngine } from './search';
import { MetricsTracker } from './jobs/metrics-tracker';
import { startPipeline, type PipelineHandle } from './jobs/pipeline';
import { createEmbedder, createLanguageModel } from './agents/llm';
import { debugLogger } from './utils/debug-logger';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('❌ Configuration error:');
      for (const issue of error.issues) {
        console.error(`   - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();

  debugLogger.info('CONFIG', 'Configuration loaded', {
    categories: config.news.categories,
    pollIntervalMs: config.news.pollIntervalMs,
    model: config.llm.model,
    embeddingModel: config.llm.embeddingModel,
    topK: config.retrieval.topK,
    retentionHours: config.retrieval.retentionHours
  });

  // Pipeline state, owned here and handed to each component
  const seen = new SeenSet();
  const index = new BruteForceVectorIndex();
  const metrics = new MetricsTracker();

  const embedder = createEmbedder(config.llm);
  const llm = createLanguageModel(config.llm);

  const connector = new NewsConnector({
    apiKey: config.news.apiKey,
    url: config.news.url,
    categories: config.news.categories,
    language: config.news.language,
    pageSize: config.news.pageSize,
    pollIntervalMs: config.news.pollIntervalMs,
    fetchTimeoutMs: config.news.fetchTimeoutMs,
    seen,
    metrics,
  });

  const documentStore = new DocumentStore({
    embedder,
    index,
    chunking: { maxTokens: config.retrieval.chunkMaxTokens },
    metrics,
  });

  const queryEngine = new QueryEngine({
    embedder,
    index,
    llm,
    topK: config.retrieval.topK,
    categories: config.news.categories,
  });

  let pipeline: PipelineHandle | null = null;

  const app = createApp({
    answerer: queryEngine,
    metrics,
    indexedChunks: () => index.size(),
    seenArticles: () => seen.size,
    pipelineRunning: () => pipeline?.isRunning() ?? false,
    server: config.server,
    pollIntervalMs: config.news.pollIntervalMs,
    retentionHours: config.retrieval.retentionHours,
  });

  const server: Server = app.listen(config.server.port, config.server.host, () => {
    console.log(`🚀 Server running on ${config.server.host}:${config.server.port}`);
    console.log(`📊 Health check: http://localhost:${config.server.port}/health`);
    console.log(`📈 Pipeline status: http://localhost:${config.server.port}/api/pipeline-status`);

    pipeline = startPipeline({
      connector,
      documentStore,
      metrics,
      retentionHours: config.retrieval.retentionHours,
    });
  });

  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log('Shutting down gracefully...');
    await new Promise<void>(resolve => server.close(() => resolve()));
    await pipeline?.stop();
    await flushTraces();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main();
