import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { SupabaseDocumentStore } from './store/supabaseStore';
import { Logger } from './utils/Logger';

const config = loadConfig();
const store = config.store ? SupabaseDocumentStore.connect(config.store) : null;
Logger.attach(store);

const app = createApp({ config, store });

process.on('unhandledRejection', (reason: unknown) => {
  Logger.logBackendError('Server', reason || new Error('Unhandled promise rejection'), {
    Endpoint: 'Process',
    Status: 'UNHANDLED_REJECTION'
  }).catch(() => {
    console.error('Unhandled rejection:', reason);
  });
});

process.on('uncaughtException', (error: Error) => {
  Logger.logBackendError('Server', error, {
    Endpoint: 'Process',
    Status: 'UNCAUGHT_EXCEPTION'
  })
    .catch(() => {
      console.error('Uncaught exception:', error);
    })
    .finally(() => process.exit(1));
});

app.listen(config.port, () => {
  console.log(`[api] listening on http://localhost:${config.port}`);
  if (!store) {
    console.warn('[api] SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY not set; store-backed routes will answer 500');
  }
  Logger.logInfo('Server', 'Server started', {
    Endpoint: 'Server',
    Status: 'STARTED',
    ResponsePayload: { port: config.port }
  }).catch((err: unknown) => {
    console.error('Failed to log startup:', err);
  });
});
