import { v4 as uuid, validate as isUuid } from 'uuid';
import type { DocumentStore } from '../store/documentStore';
import type { ProfileDocument, SaveProfileRequest, SaveProfileResponse } from '../types/api';
import type { ProfileRecord } from '../types/records';
import { InvalidArgumentError, NotFoundError, StoreConflictError } from '../utils/errors';

const SLUG_LENGTH = 10;

export function newShareSlug(): string {
  return uuid().replace(/-/g, '').slice(0, SLUG_LENGTH);
}

export async function saveProfile(
  store: DocumentStore,
  request: SaveProfileRequest,
  makeSlug: () => string = newShareSlug
): Promise<SaveProfileResponse> {
  if (!isUuid(request.user_id)) {
    throw new InvalidArgumentError('Invalid user_id');
  }

  const now = new Date().toISOString();
  const profile: ProfileRecord = {
    id: uuid(),
    user_id: request.user_id.toLowerCase(),
    content: request.content,
    loom_url: request.loom_url ?? null,
    photo_url: request.photo_url ?? null,
    share_slug: makeSlug(),
    created_at: now,
    updated_at: now,
  };

  try {
    await store.insertProfile(profile);
  } catch (error) {
    // slug collision: one more attempt with a fresh slug
    if (!(error instanceof StoreConflictError)) throw error;
    profile.share_slug = makeSlug();
    await store.insertProfile(profile);
  }
  return { profile_id: profile.id, share_slug: profile.share_slug };
}

// Public read: anyone holding the slug gets the whole profile
export async function getProfileBySlug(store: DocumentStore, slug: string): Promise<ProfileDocument> {
  const profile = await store.findProfileBySlug(slug);
  if (!profile) {
    throw new NotFoundError('Profile not found');
  }
  const { id, ...rest } = profile;
  return { _id: id, ...rest };
}
