import type { LibraryStore } from '@/services/library/store';
import {
  NetworkError,
  NotFoundError,
  UpstreamError,
  ValidationError,
  getErrorMessage,
  toNetworkError,
} from '@/services/errors';
import { STREAM_SENTINEL, completionResponseSchema, parseStreamFrame, readLines } from './frames';
import { buildChatMessages } from './prompt';
import { resolveAISettings } from './settings';
import { formatSSE } from './sse';
import type {
  AISettingsInput,
  ChatCompletionRequest,
  PromptMessage,
  ResolvedAISettings,
} from './types';

export const CHAT_TEMPERATURE = 0.7;
export const COMPLETION_TIMEOUT_MS = 30_000;
export const STREAM_TIMEOUT_MS = 60_000;
export const TEST_TIMEOUT_MS = 20_000;
const PREVIEW_LENGTH = 120;

const TEST_MESSAGES: PromptMessage[] = [
  {
    role: 'system',
    content: 'You are a test assistant used to verify API connectivity. Answer briefly.',
  },
  { role: 'user', content: 'If you receive this message, reply with: connection OK' },
];

interface ChatTurn {
  chapterId: string;
  userMessage: string;
  settings: ResolvedAISettings;
  messages: PromptMessage[];
}

export interface ChatStream {
  /** Encoded SSE frames, ending after the sentinel or an error frame. */
  events: AsyncGenerator<string, void, undefined>;
  /** Stops the upstream request; whatever was received so far is still saved. */
  abort: () => void;
}

export interface ConnectionTestResult {
  response_preview: string;
  duration_ms: number;
}

const postCompletion = (
  settings: ResolvedAISettings,
  payload: ChatCompletionRequest,
  signal: AbortSignal,
): Promise<Response> =>
  fetch(settings.endpoint, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${settings.apiKey}`,
    },
    body: JSON.stringify(payload),
    signal,
  });

const readCompletion = async (
  settings: ResolvedAISettings,
  payload: ChatCompletionRequest,
  timeoutMs: number,
  timeoutMessage: string,
): Promise<string> => {
  let status: number;
  let ok: boolean;
  let body: string;
  try {
    const response = await postCompletion(settings, payload, AbortSignal.timeout(timeoutMs));
    status = response.status;
    ok = response.ok;
    body = await response.text();
  } catch (error) {
    throw toNetworkError(error, timeoutMessage);
  }

  if (!ok) {
    throw new UpstreamError(`AI API error: ${body}`, status, body);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new UpstreamError('AI API returned a response that is not JSON', status, body);
  }

  const completion = completionResponseSchema.safeParse(json);
  if (!completion.success) {
    throw new UpstreamError('AI API returned an unexpected response', status, body);
  }
  return completion.data.choices[0].message.content;
};

/**
 * Answers questions about a chapter through an OpenAI-compatible chat API and
 * records each answered turn in the chapter's chat history.
 */
export class ChatRelay {
  constructor(private readonly library: LibraryStore) {}

  private prepareTurn(chapterId: string, message: string): ChatTurn {
    const userMessage = message.trim();
    if (!chapterId || !userMessage) {
      throw new ValidationError('chapter_id and message are required');
    }

    const chapter = this.library.getChapter(chapterId);
    if (!chapter) {
      throw new NotFoundError('Chapter not found');
    }

    const settings = resolveAISettings({}, this.library.getAISettings());
    const history = this.library.getChatHistory(chapterId);

    return {
      chapterId,
      userMessage,
      settings,
      messages: buildChatMessages(chapter.content, history, userMessage),
    };
  }

  async complete(chapterId: string, message: string): Promise<string> {
    const turn = this.prepareTurn(chapterId, message);
    const reply = await readCompletion(
      turn.settings,
      { model: turn.settings.model, messages: turn.messages, temperature: CHAT_TEMPERATURE },
      COMPLETION_TIMEOUT_MS,
      'AI request timed out',
    );

    const saved = await this.library.appendChatTurn(turn.chapterId, turn.userMessage, reply);
    if (!saved) {
      console.warn(`[chat] Chapter ${turn.chapterId} was deleted before the reply arrived, reply not saved`);
    }
    return reply;
  }

  /**
   * Validates the request and returns the relay as a lazy event sequence.
   * Validation, missing chapters and missing settings throw here, before any
   * response has been started.
   */
  openStream(chapterId: string, message: string, signal?: AbortSignal): ChatStream {
    const turn = this.prepareTurn(chapterId, message);
    const upstream = new AbortController();
    let cancelled = false;

    const abort = () => {
      cancelled = true;
      upstream.abort();
    };
    if (signal?.aborted) abort();
    signal?.addEventListener('abort', abort, { once: true });

    return {
      events: this.relay(turn, upstream, () => cancelled),
      abort,
    };
  }

  private async *relay(
    turn: ChatTurn,
    upstream: AbortController,
    isCancelled: () => boolean,
  ): AsyncGenerator<string, void, undefined> {
    let assistantText = '';
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    // Idle deadline: re-armed whenever the upstream sends something.
    const arm = () => {
      clearTimeout(timer);
      timer = setTimeout(() => {
        timedOut = true;
        upstream.abort();
      }, STREAM_TIMEOUT_MS);
    };

    try {
      let response: Response;
      try {
        arm();
        response = await postCompletion(
          turn.settings,
          {
            model: turn.settings.model,
            messages: turn.messages,
            temperature: CHAT_TEMPERATURE,
            stream: true,
          },
          upstream.signal,
        );
      } catch (error) {
        if (isCancelled()) return;
        const failure = timedOut
          ? new NetworkError('AI request timed out', true)
          : toNetworkError(error, 'AI request timed out');
        console.error('[chat] Streaming request failed:', failure.message);
        yield formatSSE(failure.message, 'error');
        return;
      }

      if (!response.ok || !response.body) {
        const body = await response.text().catch((error: unknown) => getErrorMessage(error, ''));
        console.error(`[chat] AI API responded with ${response.status}`);
        yield formatSSE(`AI API error: ${body || `HTTP ${response.status}`}`, 'error');
        return;
      }

      try {
        for await (const line of readLines(response.body)) {
          arm();
          const frame = parseStreamFrame(line);
          if (frame.kind === 'done') break;

          switch (frame.kind) {
            case 'empty':
            case 'malformed':
              break;
            case 'raw':
              yield formatSSE(frame.line);
              break;
            case 'delta':
              assistantText += frame.content;
              yield formatSSE(frame.content);
              break;
          }
        }
      } catch (error) {
        if (isCancelled()) return;
        const message = timedOut
          ? 'AI request timed out'
          : `AI stream interrupted: ${getErrorMessage(error, 'connection lost')}`;
        console.error('[chat] Streaming response failed:', message);
        yield formatSSE(message, 'error');
        return;
      }

      yield formatSSE(STREAM_SENTINEL);
    } finally {
      clearTimeout(timer);
      upstream.abort();
      await this.finalize(turn, assistantText);
    }
  }

  private async finalize(turn: ChatTurn, assistantText: string): Promise<void> {
    if (!assistantText) return;
    try {
      const saved = await this.library.appendChatTurn(turn.chapterId, turn.userMessage, assistantText);
      if (!saved) {
        console.warn(`[chat] Chapter ${turn.chapterId} was deleted during the stream, reply not saved`);
      }
    } catch (error) {
      // The response has already been sent, so the failure can only be logged.
      console.error('[chat] Could not save streamed reply:', getErrorMessage(error));
    }
  }

  async testConnection(overrides: AISettingsInput): Promise<ConnectionTestResult> {
    const settings = resolveAISettings(overrides, this.library.getAISettings());

    const start = performance.now();
    const reply = await readCompletion(
      settings,
      { model: settings.model, messages: TEST_MESSAGES, temperature: 0 },
      TEST_TIMEOUT_MS,
      'AI connection test timed out',
    );
    const duration = Math.round(performance.now() - start);

    return { response_preview: reply.slice(0, PREVIEW_LENGTH), duration_ms: duration };
  }
}
