/**
 * Chess Position Advisor API - Entry Point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { createApp } from './app.js';
import { config, validateConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { initializeModel, disposeModel } from './engine/ModelRegistry.js';

const startServer = async () => {
  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      modelPath: config.modelPath,
      blend: { ml: config.blendMlWeight, heuristic: config.blendHeuristicWeight },
    },
    'Starting Chess Position Advisor API'
  );

  // A missing model degrades to heuristics; it never stops startup
  const modelState = await initializeModel();
  logger.info({ model: modelState.status }, 'Model registry initialized');

  // Start HTTP server
  const server = createApp().listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');
      disposeModel();
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
