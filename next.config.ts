import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // The YAML seed is read from disk at request time in memory mode.
  outputFileTracingIncludes: {
    "/api/**": ["./data/**"],
  },
};

export default nextConfig;
