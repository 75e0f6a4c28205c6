import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { UpstreamError } from '@/services/errors';
import { clampSpeed, resolveVoice } from '@/services/tts';
import { OpenAICompatibleTTSClient } from '@/services/tts/openaiTTSClient';
import { MAX_CHUNK_LENGTH, splitTextIntoChunks } from '@/services/tts/textUtils';
import { createTempDir } from '../helpers/test-context';
import { stubFetch } from '../helpers/upstream-mock';

const config = { baseUrl: 'http://tts.local', apiKey: 'test-secret', model: 'tts-1' };

const audioResponse = (bytes: number[]) =>
  new Response(new Uint8Array(bytes), { status: 200, headers: { 'Content-Type': 'audio/mpeg' } });

describe('splitTextIntoChunks', () => {
  it('keeps short text in one chunk', () => {
    expect(splitTextIntoChunks('one two three')).toEqual(['one two three']);
  });

  it('breaks at whitespace without exceeding the limit', () => {
    expect(splitTextIntoChunks('aaa bbb ccc dd', 7)).toEqual(['aaa bbb', 'ccc dd']);
  });

  it('never splits words of normal length', () => {
    const words = Array.from({ length: 400 }, (_, i) => `word${i}`);
    const chunks = splitTextIntoChunks(words.join(' '));

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.length <= MAX_CHUNK_LENGTH)).toBe(true);
    expect(chunks.join(' ').split(' ')).toEqual(words);
  });

  it('cuts a single oversized word', () => {
    expect(splitTextIntoChunks('abcdefgh ij', 3)).toEqual(['abc', 'def', 'gh', 'ij']);
  });
});

describe('voice and speed options', () => {
  it('falls back to alloy for unknown voices', () => {
    expect(resolveVoice('nova')).toBe('nova');
    expect(resolveVoice('robot')).toBe('alloy');
    expect(resolveVoice(undefined)).toBe('alloy');
  });

  it('clamps the speed', () => {
    expect(clampSpeed(undefined)).toBe(1);
    expect(clampSpeed(Number.NaN)).toBe(1);
    expect(clampSpeed(0.1)).toBe(0.25);
    expect(clampSpeed(1.5)).toBe(1.5);
    expect(clampSpeed(10)).toBe(4);
  });
});

describe('OpenAICompatibleTTSClient', () => {
  let dir: string | null = null;

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('requests speech and saves it with the format extension', async () => {
    const { requests } = stubFetch(() => audioResponse([1, 2, 3]));
    const client = new OpenAICompatibleTTSClient(config);

    const result = await client.synthesize({ text: 'Hello', voice: 'echo', format: 'mp3', speed: 1.25 });

    expect(requests[0].url).toBe('http://tts.local/v1/audio/speech');
    expect(requests[0].headers.get('authorization')).toBe('Bearer test-secret');
    expect(requests[0].body).toEqual({
      model: 'tts-1',
      input: 'Hello',
      voice: 'echo',
      speed: 1.25,
      response_format: 'mp3',
    });
    expect(Array.from(result.audio)).toEqual([1, 2, 3]);

    dir = await createTempDir();
    const filename = await result.saveToFile(path.join(dir, 'outputs', 'clip'));
    expect(filename).toBe('clip.mp3');
    expect(Array.from(await fs.readFile(path.join(dir, 'outputs', 'clip.mp3')))).toEqual([1, 2, 3]);
  });

  it('synthesizes long text in parts and joins the audio', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    let call = 0;
    const { requests } = stubFetch(() => {
      call += 1;
      return audioResponse([call]);
    });
    const text = Array.from({ length: 300 }, () => 'lorem ipsum').join(' ');

    const result = await new OpenAICompatibleTTSClient(config).synthesize({
      text,
      voice: 'alloy',
      format: 'mp3',
      speed: 1,
    });

    const inputs = requests.map((request) => (request.body as { input: string }).input);
    expect(inputs.length).toBe(splitTextIntoChunks(text).length);
    expect(inputs.join(' ')).toBe(text);
    expect(Array.from(result.audio)).toEqual(inputs.map((_, i) => i + 1));
  });

  it('reports the server error message', async () => {
    stubFetch(
      () =>
        new Response(JSON.stringify({ error: { message: 'voice not supported' } }), {
          status: 400,
          headers: { 'Content-Type': 'application/json' },
        }),
    );

    const error = await new OpenAICompatibleTTSClient(config)
      .synthesize({ text: 'Hi', voice: 'alloy', format: 'mp3', speed: 1 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'Speech synthesis failed: voice not supported', upstreamStatus: 400 });
  });
});
