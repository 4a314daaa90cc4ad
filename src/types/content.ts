import { z } from 'zod';

export const generatedContentSchema = z.object({
  title: z.string(),
  summary: z.string(),
  bullets: z.array(z.string()),
  cover_letter: z.string(),
  header: z.string(),
  footer: z.string(),
  advice: z.string(),
});

export type GeneratedContent = z.infer<typeof generatedContentSchema>;
