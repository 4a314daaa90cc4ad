import { Router } from 'express';
import type { AppConfig } from '../config/env';
import type { DocumentStore } from '../store/documentStore';
import { describeStore } from '../services/diagnostics';

export function createDiagnosticsRouter(config: AppConfig, store: DocumentStore | null) {
  const diagnosticsRouter = Router();

  diagnosticsRouter.get('/', async (_req, res) => {
    res.json(await describeStore(config, store));
  });

  return diagnosticsRouter;
}
