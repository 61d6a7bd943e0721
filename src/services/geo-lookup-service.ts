import { GeoRecord } from "../models/resolution";
import { DataSourceError } from "../models/errors";
import { RedisClient } from "./redis-client";
import { IpRange, RangeSearchUtil, GEO_RANGE_PREFIX } from "./range-search-util";

export type GeoStoreClient = Pick<
  RedisClient,
  "ensureConnection" | "hGetAll" | "scanKeys"
>;

/**
 * Source of geolocation records keyed by IP address
 */
export interface GeoLocator {
  lookup(ip: string): Promise<GeoRecord | null>;
}

function optionalString(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Convert a stored location hash into a GeoRecord; empty fields stay absent
 */
export function toGeoRecord(data: Record<string, string>): GeoRecord {
  return {
    countryCode: optionalString(data.countryCode),
    countryName: optionalString(data.countryName),
    continentCode: optionalString(data.continentCode),
    region: optionalString(data.region),
    city: optionalString(data.city),
    latitude: optionalNumber(data.latitude),
    longitude: optionalNumber(data.longitude),
  };
}

/**
 * Geolocation lookups against the Redis range store
 */
export class GeoLookupService implements GeoLocator {
  private ranges: IpRange[] = [];

  constructor(private readonly store: GeoStoreClient) {}

  /**
   * Connect and cache the sorted range index. An unreachable or empty store
   * is fatal.
   */
  async initialize(): Promise<void> {
    let keys: string[];
    try {
      await this.store.ensureConnection();
      keys = await this.store.scanKeys(`${GEO_RANGE_PREFIX}*`);
    } catch (error) {
      throw new DataSourceError("Geolocation store is unavailable", error);
    }

    this.ranges = RangeSearchUtil.sortIpv4Ranges(
      RangeSearchUtil.parseIpv4RangesFromKeys(keys)
    );
    if (this.ranges.length === 0) {
      throw new DataSourceError(
        "Geolocation store holds no ranges; run the geo import first"
      );
    }

    console.log(`Loaded ${this.ranges.length} geolocation ranges`);
  }

  async lookup(ip: string): Promise<GeoRecord | null> {
    const range = RangeSearchUtil.findIpv4Range(ip, this.ranges);
    if (!range) {
      return null;
    }

    try {
      const data = await this.store.hGetAll(range.key);
      return Object.keys(data).length > 0 ? toGeoRecord(data) : null;
    } catch (error) {
      console.error(`Error looking up geolocation for ${ip}:`, error);
      return null;
    }
  }
}
