import path from 'node:path';
import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorResponse, jsonError, parseJsonBody } from '@/app/api/_utils';
import { getServerContext } from '@/services/context';
import { getErrorMessage } from '@/services/errors';
import { clampSpeed, resolveVoice } from '@/services/tts';
import { removeAudioFile } from '@/utils/audio';
import { formatFileTimestamp, shortHex } from '@/utils/format';

export const runtime = 'nodejs';

const addChapterSchema = z.object({
  title: z.string().default(''),
  text: z.string().default(''),
  voice: z.string().nullish(),
  speed: z.coerce.number().nullish(),
});

export async function POST(request: NextRequest) {
  try {
    const { library, tts, audioDir, now } = await getServerContext();
    const body = await parseJsonBody(request, addChapterSchema);
    const title = body.title.trim();
    const content = body.text.trim();

    if (!title) return jsonError('No title provided', 400);
    if (!content) return jsonError('No content provided', 400);

    const chapterId = `chapter_${shortHex(uuidv4(), 12)}`;
    const speech = await tts.synthesize({
      text: content,
      voice: resolveVoice(body.voice),
      format: 'mp3',
      speed: clampSpeed(body.speed),
    });

    const filenameBase = `${chapterId}_${formatFileTimestamp(now())}`;
    const audioFilename = await speech.saveToFile(path.join(audioDir, filenameBase));

    try {
      const chapter = await library.addChapter(chapterId, title, content, audioFilename);
      return NextResponse.json({
        success: true,
        chapter,
        message: `Chapter added successfully (${chapter.char_count} characters)`,
      });
    } catch (error) {
      await removeAudioFile(audioDir, audioFilename).catch((cleanupError: unknown) => {
        console.warn(`[api] Could not remove ${audioFilename}:`, getErrorMessage(cleanupError));
      });
      throw error;
    }
  } catch (error) {
    return errorResponse(error, 'Adding chapter');
  }
}
