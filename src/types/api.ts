import { z } from 'zod';
import { generatedContentSchema } from './content';

export const signInRequestSchema = z.object({
  email: z.string().min(1, 'email is required'),
  name: z.string().nullish(),
});

export const generateRequestSchema = z.object({
  user_id: z.string(),
  job_description: z.string(),
  user_material: z.string(),
});

export const saveProfileRequestSchema = z.object({
  user_id: z.string(),
  content: generatedContentSchema,
  loom_url: z.string().nullish(),
  photo_url: z.string().nullish(),
});

export type SignInRequest = z.infer<typeof signInRequestSchema>;
export type GenerateRequest = z.infer<typeof generateRequestSchema>;
export type SaveProfileRequest = z.infer<typeof saveProfileRequestSchema>;

export interface SignInResponse {
  user_id: string;
  token: string;
}

export interface SaveProfileResponse {
  profile_id: string;
  share_slug: string;
}

// Public shape of a stored profile; `_id` and `user_id` are plain strings
export interface ProfileDocument {
  _id: string;
  user_id: string;
  content: z.infer<typeof generatedContentSchema>;
  loom_url: string | null;
  photo_url: string | null;
  share_slug: string;
  created_at: string;
  updated_at: string;
}

export interface StoreStatus {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}
