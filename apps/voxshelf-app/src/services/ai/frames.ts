import { z } from 'zod';
import type { StreamFrame } from './types';

export const STREAM_SENTINEL = '[DONE]';

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).passthrough().nullish(),
      }),
    )
    .nullish(),
});

export const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      }),
    )
    .min(1),
});

const stripDataPrefix = (line: string) => (line.startsWith('data:') ? line.slice(5).trim() : line);

export const parseStreamFrame = (line: string): StreamFrame => {
  const payload = stripDataPrefix(line.trim());
  if (!payload) return { kind: 'empty' };
  if (payload === STREAM_SENTINEL) return { kind: 'done' };

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return { kind: 'raw', line: payload };
  }

  const chunk = streamChunkSchema.safeParse(json);
  const content = chunk.success ? chunk.data.choices?.[0]?.delta?.content : undefined;
  return content ? { kind: 'delta', content } : { kind: 'malformed' };
};

/** Splits a byte stream into lines, dropping `\r` before each `\n`. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        yield buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    if (buffer) yield buffer.replace(/\r$/, '');
  } finally {
    reader.releaseLock();
  }
}
