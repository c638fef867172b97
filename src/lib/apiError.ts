import { ConfigError } from '@/core/env';
import { UpstreamError } from '@/providers/notion/client';

export const GENERIC_ERROR_MESSAGE = 'An internal error occurred';
export const UNKNOWN_ERROR_MESSAGE = 'An unknown error occurred';

export const NO_CACHE_HEADERS: Record<string, string> = {
  'Cache-Control': 'no-cache, no-store, must-revalidate, max-age=0',
  Pragma: 'no-cache',
  Expires: '0',
};

export function sanitizeError(error: unknown): string {
  if (error instanceof UpstreamError || error instanceof ConfigError) {
    return error.message;
  }
  if (error instanceof Error) {
    if (process.env.NODE_ENV === 'development') {
      return error.message;
    }
    return GENERIC_ERROR_MESSAGE;
  }
  return UNKNOWN_ERROR_MESSAGE;
}
