/**
 * LLM Move Evaluator - HTTP entry point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import app from './app.js';
import { config, validateConfig } from './config/index.js';
import { logger } from './utils/logger.js';

const startServer = async () => {
  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      stockfishPath: config.stockfishPath,
      analysisTimeMs: config.analysisTimeMs,
      illegalMoveStatusCode: config.illegalMoveStatusCode,
    },
    'Starting LLM Move Evaluator'
  );

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown; in-flight evaluations dispose their own engines
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
};

startServer().catch((error) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
