import { NextResponse } from 'next/server';
import { errorResponse } from '@/app/api/_utils';
import { getServerContext } from '@/services/context';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET() {
  try {
    const { library } = await getServerContext();
    const chapters = library.listChapters();
    return NextResponse.json({ success: true, chapters, total: chapters.length });
  } catch (error) {
    return errorResponse(error, 'Listing chapters');
  }
}
