import { ConfigMissingError } from '@/services/errors';
import type { AISettings, PublicAISettings } from '@/types/records';
import { buildChatEndpoint } from './endpoint';
import type { AISettingsInput, ResolvedAISettings } from './types';

const pick = (override: string | null | undefined, stored: string | undefined) =>
  override?.trim() || stored?.trim() || '';

/**
 * Fills every empty override from the stored settings and checks the result
 * is usable for a completion request.
 */
export const resolveAISettings = (
  overrides: AISettingsInput,
  stored: AISettings | null,
): ResolvedAISettings => {
  const apiUrl = pick(overrides.api_url, stored?.api_url);
  const apiKey = pick(overrides.api_key, stored?.api_key);
  const model = pick(overrides.model, stored?.model);

  if (!apiUrl || !apiKey || !model) {
    throw new ConfigMissingError();
  }

  const endpoint = buildChatEndpoint(apiUrl);
  if (!endpoint) {
    throw new ConfigMissingError();
  }

  return { apiUrl, apiKey, model, endpoint };
};

export const maskApiKey = (apiKey: string): string =>
  apiKey.length > 4 ? `***${apiKey.slice(-4)}` : '***';

export const toPublicAISettings = (settings: AISettings): PublicAISettings => {
  const { api_key, ...rest } = settings;
  if (!api_key) {
    return { ...rest, has_api_key: false };
  }
  return { ...rest, api_key_masked: maskApiKey(api_key), has_api_key: true };
};
