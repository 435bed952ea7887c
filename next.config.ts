import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  serverExternalPackages: ['three'],
  poweredByHeader: false,
};

export default nextConfig;
