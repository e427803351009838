import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Remove console logs in production, keep warnings and errors
  compiler: {
    removeConsole: process.env.NODE_ENV === "production" ? {
      exclude: ["error", "warn"],
    } : false,
  },
};

export default nextConfig;
