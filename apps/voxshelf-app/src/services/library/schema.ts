import { z } from 'zod';
import type { LibraryData } from '@/types/records';

const chapterSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  audio_filename: z.string(),
  created_at: z.string(),
  char_count: z.number(),
});

const progressSchema = z.object({
  current_time: z.number(),
  last_read: z.string(),
});

const aiSettingsSchema = z.union([
  z.object({
    api_url: z.string(),
    api_key: z.string(),
    model: z.string(),
    updated_at: z.string(),
  }),
  z.object({}).strict(),
]);

const chatMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

// Older documents may miss a collection entirely; those default to empty.
export const libraryDataSchema = z.object({
  chapters: z.record(chapterSchema).default({}),
  progress: z.record(progressSchema).default({}),
  ai_settings: aiSettingsSchema.default({}),
  chat_history: z.record(z.array(chatMessageSchema)).default({}),
});

export const createEmptyLibraryData = (): LibraryData => ({
  chapters: {},
  progress: {},
  ai_settings: {},
  chat_history: {},
});
