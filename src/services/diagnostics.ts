import type { AppConfig } from '../config/env';
import type { DocumentStore } from '../store/documentStore';
import type { StoreStatus } from '../types/api';
import { errorMessage } from '../utils/errors';

const MAX_COLLECTIONS = 10;

/** Human-readable connectivity report for GET /test. Never throws. */
export async function describeStore(config: AppConfig, store: DocumentStore | null): Promise<StoreStatus> {
  const status: StoreStatus = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: null,
    database_name: null,
    connection_status: 'Not Connected',
    collections: [],
  };

  if (!store) {
    return status;
  }

  status.database = '✅ Available';
  status.database_url = config.store?.url ? '✅ Set' : '❌ Not Set';
  status.database_name = config.store?.schema ? '✅ Set' : '❌ Not Set';
  status.connection_status = 'Connected';
  try {
    const collections = await store.listCollections();
    status.collections = collections.slice(0, MAX_COLLECTIONS);
    status.database = '✅ Connected & Working';
  } catch (error) {
    status.database = `⚠️ Connected but Error: ${errorMessage(error).slice(0, 50)}`;
  }
  return status;
}
