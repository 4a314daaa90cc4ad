import { createClient, type PostgrestError, type SupabaseClient } from '@supabase/supabase-js';
import type { StoreConfig } from '../config/env';
import {
  COLLECTIONS,
  profileRecordSchema,
  userRecordSchema,
  type ApplicationLogRecord,
  type CollectionName,
  type ProfileRecord,
  type SessionRecord,
  type UserRecord,
} from '../types/records';
import { StoreConflictError } from '../utils/errors';
import type { DocumentStore } from './documentStore';

const UNIQUE_VIOLATION = '23505';
const MISSING_TABLE_CODES = ['42P01', 'PGRST205'];

function storeError(collection: CollectionName, error: PostgrestError): Error {
  if (error.code === UNIQUE_VIOLATION) {
    return new StoreConflictError(collection, error.message);
  }
  return new Error(`${collection}: ${error.message}`);
}

export class SupabaseDocumentStore implements DocumentStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly schemaName = 'public'
  ) {}

  static connect(config: StoreConfig): SupabaseDocumentStore {
    const client = createClient(config.url, config.serviceRoleKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    return new SupabaseDocumentStore(client, config.schema ?? 'public');
  }

  private table(name: CollectionName) {
    return this.client.schema(this.schemaName).from(name);
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const { data, error } = await this.table('user').select('*').eq('email', email).maybeSingle();
    if (error) throw storeError('user', error);
    return data ? userRecordSchema.parse(data) : null;
  }

  async insertUser(user: UserRecord): Promise<void> {
    const { error } = await this.table('user').insert(user);
    if (error) throw storeError('user', error);
  }

  async updateUser(id: string, patch: Pick<UserRecord, 'name' | 'updated_at'>): Promise<void> {
    const { error } = await this.table('user').update(patch).eq('id', id);
    if (error) throw storeError('user', error);
  }

  async insertSession(session: SessionRecord): Promise<void> {
    const { error } = await this.table('session').insert(session);
    if (error) throw storeError('session', error);
  }

  async insertProfile(profile: ProfileRecord): Promise<void> {
    const { error } = await this.table('profile').insert(profile);
    if (error) throw storeError('profile', error);
  }

  async findProfileBySlug(slug: string): Promise<ProfileRecord | null> {
    const { data, error } = await this.table('profile').select('*').eq('share_slug', slug).maybeSingle();
    if (error) throw storeError('profile', error);
    return data ? profileRecordSchema.parse(data) : null;
  }

  // PostgREST cannot enumerate tables; check the ones this service owns
  async listCollections(): Promise<CollectionName[]> {
    const found: CollectionName[] = [];
    for (const name of COLLECTIONS) {
      const { error } = await this.table(name).select('*', { count: 'exact', head: true });
      if (!error) {
        found.push(name);
      } else if (!MISSING_TABLE_CODES.includes(error.code)) {
        throw storeError(name, error);
      }
    }
    return found;
  }

  async writeLog(record: ApplicationLogRecord): Promise<void> {
    const { error } = await this.table('application_log').insert(record);
    if (error) throw storeError('application_log', error);
  }
}
