#!/usr/bin/env node
import { config } from "./config";
import { InvalidIpAddressError } from "./models/errors";
import { createResolutionService } from "./services/context";
import { formatResult } from "./services/output-formatter";
import { redisClient } from "./services/redis-client";
import { ResolutionService } from "./services/resolution-service";

/**
 * Resolve each address in turn, writing one line per address. Returns the
 * process exit code.
 */
export async function resolveAll(
  service: ResolutionService,
  addresses: string[],
  write: (line: string) => void = (line) => console.log(line)
): Promise<number> {
  let exitCode = 0;

  for (const address of addresses) {
    try {
      write(formatResult(await service.resolve(address)));
    } catch (error) {
      if (!(error instanceof InvalidIpAddressError)) throw error;
      console.error(`error: ${error.message}`);
      exitCode = 1;
    }
  }

  return exitCode;
}

async function main(): Promise<void> {
  const addresses = process.argv.slice(2);
  if (addresses.length === 0) {
    console.error("Usage: ipowner <ip-address> [ip-address ...]");
    process.exitCode = 2;
    return;
  }

  try {
    const service = await createResolutionService(config, redisClient);
    process.exitCode = await resolveAll(service, addresses);
  } finally {
    await redisClient.disconnect();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
