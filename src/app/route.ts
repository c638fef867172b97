import { NextRequest } from 'next/server';
import { getWidgetService } from '@/lib/widget/service';
import { widgetResponse } from '@/lib/widget/response';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const forceRefresh = request.nextUrl.searchParams.get('refresh') === '1';
  return widgetResponse(getWidgetService, { forceRefresh });
}
