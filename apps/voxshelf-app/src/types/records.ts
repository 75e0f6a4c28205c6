export interface Chapter {
  id: string;
  title: string;
  content: string;
  audio_filename: string;
  created_at: string;
  char_count: number;
}

export interface ChapterProgress {
  // Playback offset in seconds.
  current_time: number;
  last_read: string;
}

export interface AISettings {
  api_url: string;
  api_key: string;
  model: string;
  updated_at: string;
}

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp: string;
}

export interface LibraryData {
  chapters: Record<string, Chapter>;
  progress: Record<string, ChapterProgress>;
  // Stored as `{}` until the first save.
  ai_settings: AISettings | Record<string, never>;
  chat_history: Record<string, ChatMessage[]>;
}

/** Settings as exposed to clients: the key is reduced to its last four characters. */
export interface PublicAISettings {
  api_url: string;
  model: string;
  updated_at: string;
  api_key_masked?: string;
  has_api_key: boolean;
}
