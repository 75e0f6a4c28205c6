const COMPLETIONS_PATH = '/chat/completions';

/** Normalizes an OpenAI-compatible base URL to its chat completions endpoint. */
export const buildChatEndpoint = (baseUrl: string): string => {
  const normalized = baseUrl.trim().replace(/\/+$/, '');
  if (!normalized) return '';
  if (normalized.toLowerCase().endsWith(COMPLETIONS_PATH)) return normalized;
  return `${normalized}${COMPLETIONS_PATH}`;
};
