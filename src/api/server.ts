import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { RecognitionConfig } from '../config/ConfigSchema.js';
import { ConfigLoader } from '../config/ConfigLoader.js';
import { ConfusionCorrector } from '../recognition/correction/ConfusionCorrector.js';
import { logger } from '../utils/logger.js';

// Import route handlers
import { createRecognitionRoutes } from './routes/recognition.js';

// Import middleware
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { validateApiKey } from './middleware/auth.js';

export interface ApiServerOptions {
  port?: number;
  host?: string;
  enableCors?: boolean;
  corsOrigins?: string[];
  requireApiKey?: boolean;
  apiKeys?: string[];
}

export interface ApiServerDependencies {
  /**
   * Base configuration; defaults when omitted
   */
  config?: RecognitionConfig;
  corrector?: ConfusionCorrector;
}

const AVAILABLE_ENDPOINTS = [
  'GET /health',
  'GET /api',
  'POST /api/v1/recognition/filter',
  'POST /api/v1/recognition/lines',
  'POST /api/v1/recognition/correct',
  'POST /api/v1/recognition/correct/batch',
  'POST /api/v1/recognition/fuse'
];

/**
 * Creates and configures the Express API server
 */
export function createApiServer(
  dependencies: ApiServerDependencies = {},
  options: ApiServerOptions = {}
): express.Application {
  const app = express();

  // Extract options with defaults
  const {
    enableCors = true,
    corsOrigins = ['*'],
    requireApiKey = false,
    apiKeys = []
  } = options;

  const config = dependencies.config ?? ConfigLoader.getDefaultConfig();
  const corrector = dependencies.corrector ?? new ConfusionCorrector();

  // Basic middleware
  app.use(express.json({ limit: '10mb' }));

  // CORS middleware
  if (enableCors) {
    app.use(cors({
      origin: corsOrigins.includes('*') ? true : corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key']
    }));
  }

  // Request logging
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime()
    });
  });

  // API info endpoint
  app.get('/api', (req, res) => {
    res.json({
      name: 'Wheel Hub OCR API',
      version: '1.0.0',
      description: 'Filtering, correction and multi-image fusion of wheel hub code readings',
      endpoints: {
        filter: '/api/v1/recognition/filter',
        lines: '/api/v1/recognition/lines',
        correct: '/api/v1/recognition/correct',
        correctBatch: '/api/v1/recognition/correct/batch',
        fuse: '/api/v1/recognition/fuse'
      }
    });
  });

  // Mount API routes
  const apiV1 = express.Router();

  // API key authentication (if required)
  if (requireApiKey && apiKeys.length > 0) {
    apiV1.use(validateApiKey(apiKeys));
  }

  apiV1.use('/recognition', createRecognitionRoutes(config, corrector));

  // Mount API v1
  app.use('/api/v1', apiV1);

  // 404 handler
  app.use(notFoundHandler(AVAILABLE_ENDPOINTS));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the API server
 */
export async function startApiServer(
  dependencies: ApiServerDependencies = {},
  options: ApiServerOptions = {}
): Promise<{ app: express.Application; server: Server }> {
  const {
    port = process.env.PORT ? parseInt(process.env.PORT, 10) : 3000,
    host = process.env.HOST || '0.0.0.0'
  } = options;

  const app = createApiServer(dependencies, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Wheel Hub OCR API server started on ${host}:${port}`);
      logger.info(`Health check: http://${host}:${port}/health`);
      logger.info(`API info: http://${host}:${port}/api`);
      resolve({ app, server });
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${port} is already in use`);
      } else {
        logger.error('Server error', error);
      }
      reject(error);
    });
  });
}
