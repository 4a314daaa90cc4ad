import { StoreUnavailableError } from '../utils/errors';
import type { LogSink } from '../utils/Logger';
import type { CollectionName, ProfileRecord, SessionRecord, UserRecord } from '../types/records';

/**
 * Handle to the `user`, `session` and `profile` collections.
 * Opened once at startup and handed to every router that needs it.
 */
export interface DocumentStore extends LogSink {
  findUserByEmail(email: string): Promise<UserRecord | null>;
  /** Throws StoreConflictError when the email is already taken. */
  insertUser(user: UserRecord): Promise<void>;
  updateUser(id: string, patch: Pick<UserRecord, 'name' | 'updated_at'>): Promise<void>;
  insertSession(session: SessionRecord): Promise<void>;
  insertProfile(profile: ProfileRecord): Promise<void>;
  findProfileBySlug(slug: string): Promise<ProfileRecord | null>;
  listCollections(): Promise<CollectionName[]>;
}

export function requireStore(store: DocumentStore | null): DocumentStore {
  if (!store) {
    throw new StoreUnavailableError();
  }
  return store;
}
