import { AppConfig } from "../config";
import { AsnResolver } from "./asn-resolver";
import { NodeDnsClient, nodeResolverFactory } from "./dns-client";
import { GeoLookupService } from "./geo-lookup-service";
import { NameResolver } from "./name-resolver";
import { RedisClient } from "./redis-client";
import { ResolutionService } from "./resolution-service";
import { loadSuffixTree } from "./suffix-list-loader";

/**
 * Load the data sources and wire the resolution service. Throws
 * DataSourceError when the suffix list or geolocation store is unusable.
 */
export async function createResolutionService(
  config: AppConfig,
  redis: RedisClient
): Promise<ResolutionService> {
  const suffixTree = loadSuffixTree(config.publicSuffixFile);

  const geoLocator = new GeoLookupService(redis);
  await geoLocator.initialize();

  const dns = new NodeDnsClient(nodeResolverFactory(config.dnsServers));

  return new ResolutionService({
    asnResolver: new AsnResolver(dns, {
      registryA: config.asnRegistryA,
      registryB: config.asnRegistryB,
    }),
    nameResolver: new NameResolver(dns),
    suffixTree,
    geoLocator,
  });
}
