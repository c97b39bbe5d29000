/**
 * Environment configuration
 */

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3001', 10),
  isProduction: process.env.NODE_ENV === 'production',
  logLevel:
    process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),

  // Service metadata, reported by / and /api/v1/health
  serviceName: process.env.SERVICE_NAME || 'llm-move-evaluator',
  serviceVersion: process.env.npm_package_version || '1.0.0',

  // A FEN, a move and two options; anything bigger is not an evaluation request
  requestBodyLimit: process.env.REQUEST_BODY_LIMIT || '16kb',

  // Stockfish
  stockfishPath: process.env.STOCKFISH_PATH || 'stockfish',
  stockfishThreads: parseInt(process.env.STOCKFISH_THREADS || '1', 10),
  stockfishHashMb: parseInt(process.env.STOCKFISH_HASH_MB || '16', 10),
  analysisTimeMs: parseInt(process.env.ANALYSIS_TIME_MS || '100', 10),
  engineTimeoutMs: parseInt(process.env.ENGINE_TIMEOUT_MS || '10000', 10),

  // Illegal moves answer 500 unless overridden (400 treats them as client errors)
  illegalMoveStatusCode: parseInt(process.env.ILLEGAL_MOVE_STATUS || '500', 10),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),
} as const;

export type Config = typeof config;

/**
 * Returns one warning per setting that is out of range.
 */
export function validateConfig(): string[] {
  const warnings: string[] = [];

  const positive = [
    'port',
    'stockfishThreads',
    'stockfishHashMb',
    'analysisTimeMs',
    'engineTimeoutMs',
  ] as const;

  for (const key of positive) {
    if (!Number.isFinite(config[key]) || config[key] <= 0) {
      warnings.push(`${key} must be a positive integer, got ${config[key]}`);
    }
  }

  if (config.illegalMoveStatusCode !== 400 && config.illegalMoveStatusCode !== 500) {
    warnings.push(
      `illegalMoveStatusCode should be 400 or 500, got ${config.illegalMoveStatusCode}`
    );
  }

  return warnings;
}
