import { NextResponse } from 'next/server';
import { NO_CACHE_HEADERS, sanitizeError } from '@/lib/apiError';
import { createChildLogger } from '@/utils/logger';
import { renderError, renderWidget } from './render';
import type { ComputeOptions, WidgetService } from './service';

const logger = createChildLogger('widget');

function htmlResponse(body: string, status: number): NextResponse {
  return new NextResponse(body, {
    status,
    headers: {
      ...NO_CACHE_HEADERS,
      'Content-Type': 'text/html; charset=utf-8',
    },
  });
}

/**
 * Render the widget page. Every failure along the way, including a
 * config error while building the service, becomes the error page.
 */
export async function widgetResponse(
  resolveService: () => WidgetService,
  options: ComputeOptions = {}
): Promise<NextResponse> {
  try {
    const service = resolveService();
    const snapshot = await service.compute(options);
    return htmlResponse(renderWidget(service.toView(snapshot)), 200);
  } catch (error) {
    logger.error({ err: error }, 'Failed to render widget');
    return htmlResponse(renderError(sanitizeError(error)), 500);
  }
}
