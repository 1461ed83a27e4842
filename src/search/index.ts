export { BruteForceVectorIndex, type VectorIndex } from './vector-index';
export { QueryEngine, DEFAULT_TOP_K, type Answerer, type QueryEngineOptions } from './query-engine';
export { buildContext } from './context-builder';
export { cosineSimilarity } from './similarity';
