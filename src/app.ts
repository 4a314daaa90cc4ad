import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/env';
import type { DocumentStore } from './store/documentStore';
import { createTextExtractor, type TextExtractor } from './services/textExtractor';
import { createAuthRouter } from './routes/auth';
import { createUploadRouter } from './routes/upload';
import { createGenerateRouter } from './routes/generate';
import { createProfileRouter } from './routes/profile';
import { createDiagnosticsRouter } from './routes/diagnostics';
import { Logger } from './utils/Logger';

export interface AppDependencies {
  config: AppConfig;
  /** null when the store is not configured; store-backed routes then answer 500. */
  store: DocumentStore | null;
  extractor?: TextExtractor;
}

export function createApp({ config, store, extractor }: AppDependencies) {
  const app = express();
  const allowedOrigins = config.allowedOrigins;

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        return callback(new Error('Not allowed by CORS'));
      },
      credentials: true,
    })
  );

  app.use(express.json({ limit: config.bodyLimit }));
  app.use(express.urlencoded({ limit: config.bodyLimit, extended: true }));

  app.get('/', (_req, res) => {
    res.json({ message: 'Resume Builder API running' });
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/auth', createAuthRouter(store));
  app.use(
    '/upload',
    createUploadRouter({
      store,
      extractor: extractor ?? createTextExtractor({ capabilities: config.capabilities }),
      maxUploadBytes: config.maxUploadBytes,
    })
  );
  app.use('/generate', createGenerateRouter());
  app.use('/profile', createProfileRouter(store));
  app.use('/test', createDiagnosticsRouter(config, store));

  app.use((_req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  // Global error handler middleware
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' && err.status < 500
        ? err.status
        : 500;

    Logger.logBackendError('Server', err, {
      Endpoint: req.path || 'Unknown',
      Status: status === 500 ? 'UNHANDLED_ERROR' : 'REQUEST_ERROR',
      RequestPayload: { method: req.method, path: req.path }
    }).catch((logErr: unknown) => {
      console.error('Failed to log error:', logErr);
    });

    res.status(status).json({ detail: status === 500 ? 'Internal server error' : 'Invalid request body' });
  });

  return app;
}
