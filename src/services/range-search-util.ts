import { IpUtil } from "./ip-util";

export const GEO_RANGE_PREFIX = "geoip:v4:range:";

/**
 * Range representation for binary search
 */
export interface IpRange {
  startIp: number;
  endIp: number;
  key: string; // Redis key holding the range's location hash
}

/**
 * Utility class for IP range lookups using binary search
 */
export class RangeSearchUtil {
  /**
   * Redis key for a range, e.g. "geoip:v4:range:3232235776:3232236031"
   */
  static rangeKey(startIp: number, endIp: number): string {
    return `${GEO_RANGE_PREFIX}${startIp}:${endIp}`;
  }

  /**
   * Find the range containing the specified IP using binary search
   *
   * @param ip - The IPv4 address to look up
   * @param ranges - Ranges sorted by startIp, not overlapping
   * @returns The matching range or null if not found
   */
  static findIpv4Range(ip: string, ranges: IpRange[]): IpRange | null {
    const ipNum = IpUtil.ipToLong(ip);

    let left = 0;
    let right = ranges.length - 1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      const range = ranges[mid];

      if (ipNum >= range.startIp && ipNum <= range.endIp) {
        return range;
      } else if (ipNum < range.startIp) {
        right = mid - 1;
      } else {
        left = mid + 1;
      }
    }

    return null;
  }

  /**
   * Sort ranges by start address (ascending)
   */
  static sortIpv4Ranges(ranges: IpRange[]): IpRange[] {
    return [...ranges].sort((a, b) => a.startIp - b.startIp);
  }

  /**
   * Parse ranges out of keys in the format "geoip:v4:range:{startIp}:{endIp}",
   * skipping anything malformed
   */
  static parseIpv4RangesFromKeys(keys: string[]): IpRange[] {
    return keys
      .filter((key) => key.startsWith(GEO_RANGE_PREFIX))
      .map((key) => {
        const parts = key.slice(GEO_RANGE_PREFIX.length).split(":");
        if (parts.length !== 2 || !parts.every((p) => /^\d+$/.test(p))) {
          return null;
        }

        const startIp = parseInt(parts[0], 10);
        const endIp = parseInt(parts[1], 10);
        if (startIp > endIp || endIp > 0xffffffff) return null;

        return { startIp, endIp, key };
      })
      .filter((range): range is IpRange => range !== null);
  }
}
