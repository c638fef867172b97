/**
 * Runs once when the Next.js server starts. Loading the config here makes a
 * missing API_TOKEN or DATABASE_ID abort startup instead of the first request.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { getEnvConfig } = await import('@/core/env');
  const { createChildLogger } = await import('@/utils/logger');

  const config = getEnvConfig();
  createChildLogger('startup').info(
    {
      databaseId: config.databaseId,
      pointsPerLevel: config.pointsPerLevel,
      cacheTtlSeconds: config.cacheTtlSeconds,
      xpProperty: config.xpProperty,
    },
    'Widget configuration loaded'
  );
}
