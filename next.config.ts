import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // pino resolves its transports at runtime; keep it out of the server bundle
  serverExternalPackages: ['pino', 'pino-pretty'],
};

export default nextConfig;
