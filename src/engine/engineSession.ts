/**
 * Scoped engine access: one engine per evaluation, always disposed
 */

import type { AnalysisEngine, EngineFactory } from '../types/index.js';
import { config } from '../config/index.js';
import { StockfishEngine } from './StockfishEngine.js';

export const createStockfishEngine: EngineFactory = () =>
  new StockfishEngine({
    path: config.stockfishPath,
    threads: config.stockfishThreads,
    hashMb: config.stockfishHashMb,
    timeoutMs: config.engineTimeoutMs,
  });

/**
 * Start an engine, run `fn` with it and dispose it on every exit path
 */
export async function withEngine<T>(
  createEngine: EngineFactory,
  fn: (engine: AnalysisEngine) => Promise<T>
): Promise<T> {
  const engine = createEngine();

  try {
    await engine.initialize();
    return await fn(engine);
  } finally {
    await engine.dispose();
  }
}
