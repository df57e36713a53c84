import express from 'express';
import cors from 'cors';
import type { RagConfig } from './config/rag-config.js';
import type { RagContext } from './services/rag/context.js';
import { requireBackendKey } from './middleware/auth.js';
import { createRagRouter } from './routes/rag.js';

export function createApp(ctx: RagContext, config: RagConfig): express.Express {
  const app = express();

  // CORS configuration - supports multiple origins
  const allowedOrigins = [
    'http://localhost:5173',
    'http://localhost:3000',
    ...config.frontendUrls,
  ];

  // Middleware
  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like server-to-server calls or curl)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowedOrigins.includes(origin)) {
        callback(null, origin);
      } else {
        console.warn(`CORS blocked origin: ${origin}`);
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
  }));
  // Documents arrive inline in the ingest body
  app.use(express.json({ limit: '10mb' }));

  // Health check (no auth required)
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      backend: config.backend,
    });
  });

  // Protected routes (require backend key)
  app.use('/api/rag', requireBackendKey(config.backendApiKey), createRagRouter(ctx, config));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
