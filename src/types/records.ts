import { z } from 'zod';
import { generatedContentSchema } from './content';

// Rows as they live in the `user`, `session`, `profile` and `application_log` tables
export const userRecordSchema = z.object({
  id: z.string(),
  email: z.string(),
  name: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const sessionRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  token: z.string(),
  created_at: z.string(),
});

export const profileRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  content: generatedContentSchema,
  loom_url: z.string().nullable(),
  photo_url: z.string().nullable(),
  share_slug: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type UserRecord = z.infer<typeof userRecordSchema>;
export type SessionRecord = z.infer<typeof sessionRecordSchema>;
export type ProfileRecord = z.infer<typeof profileRecordSchema>;

export interface ApplicationLogRecord {
  UserID: string | null;
  TransactionID: string | null;
  Category: string | null;
  Endpoint: string | null;
  RequestPayload: string | null;
  ResponsePayload: string | null;
  Exception: string | null;
  ExceptionStackTrace: string | null;
  RelatedTo: string | null;
  Status: string | null;
}

export const COLLECTIONS = ['user', 'session', 'profile', 'application_log'] as const;
export type CollectionName = (typeof COLLECTIONS)[number];
