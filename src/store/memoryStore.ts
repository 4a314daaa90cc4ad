import {
  COLLECTIONS,
  type ApplicationLogRecord,
  type CollectionName,
  type ProfileRecord,
  type SessionRecord,
  type UserRecord,
} from '../types/records';
import { StoreConflictError } from '../utils/errors';
import type { DocumentStore } from './documentStore';

/**
 * In-process DocumentStore with the same uniqueness rules as the SQL schema
 * (user.email, session.token, profile.share_slug). Used by the test suite.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly users = new Map<string, UserRecord>();
  readonly sessions: SessionRecord[] = [];
  readonly profiles: ProfileRecord[] = [];
  readonly logs: ApplicationLogRecord[] = [];

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    for (const user of this.users.values()) {
      if (user.email === email) return { ...user };
    }
    return null;
  }

  async insertUser(user: UserRecord): Promise<void> {
    for (const existing of this.users.values()) {
      if (existing.email === user.email) {
        throw new StoreConflictError('user', `duplicate email ${user.email}`);
      }
    }
    this.users.set(user.id, { ...user });
  }

  async updateUser(id: string, patch: Pick<UserRecord, 'name' | 'updated_at'>): Promise<void> {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, ...patch });
    }
  }

  async insertSession(session: SessionRecord): Promise<void> {
    if (this.sessions.some((s) => s.token === session.token)) {
      throw new StoreConflictError('session', 'duplicate token');
    }
    this.sessions.push({ ...session });
  }

  async insertProfile(profile: ProfileRecord): Promise<void> {
    if (this.profiles.some((p) => p.share_slug === profile.share_slug)) {
      throw new StoreConflictError('profile', 'duplicate share_slug');
    }
    this.profiles.push(structuredClone(profile));
  }

  async findProfileBySlug(slug: string): Promise<ProfileRecord | null> {
    const profile = this.profiles.find((p) => p.share_slug === slug);
    return profile ? structuredClone(profile) : null;
  }

  async listCollections(): Promise<CollectionName[]> {
    return [...COLLECTIONS];
  }

  async writeLog(record: ApplicationLogRecord): Promise<void> {
    this.logs.push(record);
  }
}
