import { v4 as uuid } from 'uuid';
import type { DocumentStore } from '../store/documentStore';
import type { SignInRequest, SignInResponse } from '../types/api';
import type { UserRecord } from '../types/records';
import { StoreConflictError } from '../utils/errors';

async function findOrCreateUser(store: DocumentStore, email: string, name: string | null | undefined): Promise<string> {
  const now = new Date().toISOString();
  let existing = await store.findUserByEmail(email);

  if (!existing) {
    const user: UserRecord = {
      id: uuid(),
      email,
      name: name || email.split('@')[0],
      created_at: now,
      updated_at: now,
    };
    try {
      await store.insertUser(user);
      return user.id;
    } catch (error) {
      // a concurrent sign-in created the same email first
      if (!(error instanceof StoreConflictError)) throw error;
      existing = await store.findUserByEmail(email);
      if (!existing) throw error;
    }
  }

  await store.updateUser(existing.id, { name: name || existing.name, updated_at: now });
  return existing.id;
}

/** Find-or-create the user by email and open a new session for it. */
export async function signIn(store: DocumentStore, request: SignInRequest): Promise<SignInResponse> {
  const userId = await findOrCreateUser(store, request.email, request.name);
  const token = uuid();
  await store.insertSession({
    id: uuid(),
    user_id: userId,
    token,
    created_at: new Date().toISOString(),
  });
  return { user_id: userId, token };
}
