import type { ChatRole } from '@/types/records';

export type PromptRole = 'system' | ChatRole;

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: PromptMessage[];
  temperature: number;
  stream?: boolean;
}

/** Per-field overrides for the stored settings, as sent by the settings form. */
export interface AISettingsInput {
  api_url?: string | null;
  api_key?: string | null;
  model?: string | null;
}

export interface ResolvedAISettings {
  apiUrl: string;
  apiKey: string;
  model: string;
  endpoint: string;
}

/**
 * One line of an upstream streaming response.
 *
 * `raw` lines are not JSON and are passed through to the client as they are;
 * `malformed` lines are JSON without a text fragment and are dropped.
 */
export type StreamFrame =
  | { kind: 'empty' }
  | { kind: 'done' }
  | { kind: 'raw'; line: string }
  | { kind: 'delta'; content: string }
  | { kind: 'malformed' };
