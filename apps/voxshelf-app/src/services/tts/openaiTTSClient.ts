import fs from 'node:fs/promises';
import path from 'node:path';
import { UpstreamError, toNetworkError } from '@/services/errors';
import type { TTSConfig } from '@/services/environment';
import { MAX_CHUNK_LENGTH, splitTextIntoChunks } from './textUtils';
import type { AudioFormat, SpeechRequest, SpeechResult, TTSClient } from './types';

const SPEECH_TIMEOUT_MS = 120_000;

const readErrorMessage = async (response: Response): Promise<string> => {
  const fallback = `HTTP ${response.status}: ${response.statusText}`;
  const text = await response.text().catch(() => '');
  if (!text) return fallback;
  try {
    const data: unknown = JSON.parse(text);
    if (data && typeof data === 'object' && 'error' in data) {
      const { error } = data;
      if (typeof error === 'string') return error;
      if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
    }
  } catch {
    return text;
  }
  return fallback;
};

const concatAudio = (parts: Uint8Array[]): Uint8Array => {
  const total = parts.reduce((sum, part) => sum + part.byteLength, 0);
  const audio = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    audio.set(part, offset);
    offset += part.byteLength;
  }
  return audio;
};

export const createSpeechResult = (audio: Uint8Array, format: AudioFormat): SpeechResult => ({
  audio,
  format,
  saveToFile: async (pathBase: string) => {
    const filePath = `${pathBase}.${format}`;
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, audio);
    return path.basename(filePath);
  },
});

/**
 * Client for servers exposing the OpenAI `/v1/audio/speech` endpoint.
 *
 * Long text is synthesized chunk by chunk and the parts are joined into a single file.
 */
export class OpenAICompatibleTTSClient implements TTSClient {
  constructor(private readonly config: TTSConfig) {}

  private async requestSpeech(text: string, request: SpeechRequest): Promise<Uint8Array> {
    const url = `${this.config.baseUrl}/v1/audio/speech`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Accept: 'audio/*, */*',
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
        },
        body: JSON.stringify({
          model: this.config.model,
          input: text,
          voice: request.voice,
          speed: request.speed,
          response_format: request.format,
        }),
        signal: AbortSignal.timeout(SPEECH_TIMEOUT_MS),
      });
    } catch (error) {
      throw toNetworkError(error, 'Speech synthesis timed out');
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      throw new UpstreamError(`Speech synthesis failed: ${message}`, response.status, message);
    }

    return new Uint8Array(await response.arrayBuffer());
  }

  async synthesize(request: SpeechRequest): Promise<SpeechResult> {
    const chunks =
      request.text.length > MAX_CHUNK_LENGTH ? splitTextIntoChunks(request.text) : [request.text];
    if (chunks.length > 1) {
      console.log(`[tts] Synthesizing long text (${request.text.length} characters) in ${chunks.length} parts`);
    }

    const parts: Uint8Array[] = [];
    for (const chunk of chunks) {
      parts.push(await this.requestSpeech(chunk, request));
    }
    return createSpeechResult(concatAudio(parts), request.format);
  }
}
