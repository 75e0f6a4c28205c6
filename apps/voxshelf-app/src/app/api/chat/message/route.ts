import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseJsonBody } from '@/app/api/_utils';
import { SSE_HEADERS, toEventStream } from '@/services/ai/sse';
import { getServerContext } from '@/services/context';

export const runtime = 'nodejs';

// Any truthy JSON value turns streaming on: `1` and `"yes"` count, `0`, `""`, `[]` and `{}` do not.
const isTruthy = (value: unknown): boolean => {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
};

const chatMessageSchema = z.object({
  chapter_id: z.string().default(''),
  message: z.string().default(''),
  stream: z.preprocess(isTruthy, z.boolean()),
});

export async function POST(request: NextRequest) {
  try {
    const { chat } = await getServerContext();
    const { chapter_id, message, stream } = await parseJsonBody(request, chatMessageSchema);

    if (!stream) {
      const reply = await chat.complete(chapter_id, message);
      return NextResponse.json({ success: true, message: reply });
    }

    // Headers are committed once the body starts, so later failures arrive as error events.
    const { events, abort } = chat.openStream(chapter_id, message, request.signal);
    return new Response(toEventStream(events, abort), { headers: SSE_HEADERS });
  } catch (error) {
    return errorResponse(error, 'Chat request');
  }
}
