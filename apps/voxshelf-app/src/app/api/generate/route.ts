import path from 'node:path';
import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorResponse, jsonError, parseJsonBody } from '@/app/api/_utils';
import { getServerContext } from '@/services/context';
import { clampSpeed, resolveVoice } from '@/services/tts';
import { MAX_CHUNK_LENGTH } from '@/services/tts/textUtils';
import { formatFileTimestamp, shortHex } from '@/utils/format';

export const runtime = 'nodejs';

const generateSchema = z.object({
  text: z.string().default(''),
  voice: z.string().nullish(),
  speed: z.coerce.number().nullish(),
});

export async function POST(request: NextRequest) {
  try {
    const { tts, audioDir, now } = await getServerContext();
    const body = await parseJsonBody(request, generateSchema);
    const text = body.text.trim();
    if (!text) return jsonError('No text provided', 400);

    const speech = await tts.synthesize({
      text,
      voice: resolveVoice(body.voice),
      format: 'mp3',
      speed: clampSpeed(body.speed),
    });

    const filenameBase = `tts_${shortHex(uuidv4(), 8)}_${formatFileTimestamp(now())}`;
    const filename = await speech.saveToFile(path.join(audioDir, filenameBase));

    return NextResponse.json({
      success: true,
      filename,
      message: `Speech generated successfully (${text.length} characters)`,
      text_length: text.length,
      is_long_text: text.length > MAX_CHUNK_LENGTH,
    });
  } catch (error) {
    return errorResponse(error, 'Generating speech');
  }
}
