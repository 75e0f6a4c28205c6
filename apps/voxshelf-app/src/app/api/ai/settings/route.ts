import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, jsonError, parseJsonBody } from '@/app/api/_utils';
import { toPublicAISettings } from '@/services/ai/settings';
import { getServerContext } from '@/services/context';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const saveSettingsSchema = z.object({
  api_url: z.string().nullish(),
  api_key: z.string().nullish(),
  model: z.string().nullish(),
});

export async function GET() {
  try {
    const { library } = await getServerContext();
    const settings = library.getAISettings();
    return NextResponse.json({
      success: true,
      settings: settings ? toPublicAISettings(settings) : null,
    });
  } catch (error) {
    return errorResponse(error, 'Loading AI settings');
  }
}

export async function POST(request: NextRequest) {
  try {
    const { library } = await getServerContext();
    const body = await parseJsonBody(request, saveSettingsSchema);
    const apiUrl = body.api_url?.trim() ?? '';
    const model = body.model?.trim() ?? '';
    let apiKey = body.api_key?.trim() ?? '';

    if (!apiUrl || !model) {
      return jsonError('api_url and model are required', 400);
    }

    // An omitted key keeps the one already stored.
    if (!apiKey) {
      const existing = library.getAISettings();
      if (!existing?.api_key) {
        return jsonError('api_key is required', 400);
      }
      apiKey = existing.api_key;
    }

    await library.saveAISettings(apiUrl, apiKey, model);
    return NextResponse.json({ success: true, message: 'AI settings saved' });
  } catch (error) {
    return errorResponse(error, 'Saving AI settings');
  }
}
