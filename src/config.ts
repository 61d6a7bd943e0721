import dotenv from "dotenv";
import path from "path";

// Load environment variables from .env
dotenv.config();

export interface AppConfig {
  port: number;
  redisHost: string;
  redisPort: number;
  publicSuffixFile: string;
  asnRegistryA: string;
  asnRegistryB: string;
  dnsServers: string[];
}

/**
 * Parse a numeric environment value, falling back to the default when unset
 * or not a positive integer
 */
function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    console.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build the application configuration from the environment
 */
export function loadConfig(): AppConfig {
  return {
    port: readInt("PORT", 3001),
    redisHost: process.env.REDIS_HOST || "localhost",
    redisPort: readInt("REDIS_PORT", 6379),
    publicSuffixFile: path.resolve(
      process.cwd(),
      process.env.PUBLIC_SUFFIX_FILE || "data/public_suffix_list.dat"
    ),
    asnRegistryA: process.env.ASN_REGISTRY_A || "routeviews.org",
    asnRegistryB: process.env.ASN_REGISTRY_B || "cymru.com",
    dnsServers: (process.env.DNS_SERVERS || "")
      .split(",")
      .map((server) => server.trim())
      .filter((server) => server.length > 0),
  };
}

export const config = loadConfig();
