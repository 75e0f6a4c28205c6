import type { ChatMessage } from '@/types/records';
import type { PromptMessage } from './types';

export const HISTORY_WINDOW = 10;

const buildSystemPrompt = (chapterContent: string) =>
  'You are a reading assistant. The user is reading the text below; ' +
  'answer their questions based on it.\n\n' +
  `Text:\n${chapterContent}`;

/**
 * System prompt with the chapter text, the last {@link HISTORY_WINDOW} messages
 * of the conversation, then the new user message.
 */
export const buildChatMessages = (
  chapterContent: string,
  history: ChatMessage[],
  userMessage: string,
): PromptMessage[] => [
  { role: 'system', content: buildSystemPrompt(chapterContent) },
  ...history.slice(-HISTORY_WINDOW).map(({ role, content }) => ({ role, content })),
  { role: 'user', content: userMessage },
];
