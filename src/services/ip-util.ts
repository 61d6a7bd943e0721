import { Address, Cidr } from "../models/resolution";
import { InvalidIpAddressError } from "../models/errors";

/**
 * Utility functions for working with IPv4 addresses and CIDR blocks
 */
export class IpUtil {
  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Convert a numeric representation back to an IPv4 address string
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  /**
   * Validate if the given string is a valid IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    const pattern = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
    if (!pattern.test(ip)) return false;

    return ip
      .split(".")
      .map(Number)
      .every((num) => num >= 0 && num <= 255);
  }

  /**
   * Parse textual input into an Address, throwing on anything that is not a
   * dotted-quad IPv4 literal
   */
  static parseAddress(input: string): Address {
    const ip = input.trim();
    if (!this.isValidIpv4(ip)) {
      throw new InvalidIpAddressError(input);
    }

    // Re-render to drop leading zeros ("010.1.2.3" -> "10.1.2.3")
    const canonical = this.longToIp(this.ipToLong(ip));
    const reversedLabels = canonical.split(".").reverse().join(".");

    return Object.freeze({
      ip: canonical,
      reversedLabels,
      reverseName: `${reversedLabels}.in-addr.arpa`,
      cidr: Object.freeze({ network: canonical, prefixLength: 32 }),
    });
  }

  /**
   * Reverse-zone name for an address, e.g. "1.2.0.192.in-addr.arpa"
   */
  static reverseName(ip: string): string {
    return `${ip.split(".").reverse().join(".")}.in-addr.arpa`;
  }

  /**
   * Network mask for a prefix length as an unsigned 32-bit number
   */
  static prefixMask(prefixLength: number): number {
    if (prefixLength <= 0) return 0;
    return (0xffffffff << (32 - prefixLength)) >>> 0;
  }

  /**
   * Calculate the number of IP addresses in a subnet mask
   */
  static calculateIPv4SubnetSize(prefixLength: number): number {
    // For a /24 subnet, we get 2^(32-24) = 2^8 = 256 addresses
    return Math.pow(2, 32 - prefixLength);
  }

  /**
   * Calculate the first IP address in a subnet
   */
  static getIPv4SubnetStart(ip: string, prefixLength: number): string {
    const mask = this.prefixMask(prefixLength);
    return this.longToIp((this.ipToLong(ip) & mask) >>> 0);
  }

  /**
   * Calculate the last IP address in a subnet
   */
  static getIPv4SubnetEnd(ip: string, prefixLength: number): string {
    const mask = this.prefixMask(prefixLength);
    return this.longToIp((this.ipToLong(ip) | ~mask) >>> 0);
  }

  /**
   * Build a Cidr from a network address and prefix length, normalizing the
   * network to the block's first address. Returns null for invalid parts.
   */
  static toCidr(network: string, prefixLength: number): Cidr | null {
    if (
      !this.isValidIpv4(network) ||
      !Number.isInteger(prefixLength) ||
      prefixLength < 0 ||
      prefixLength > 32
    ) {
      return null;
    }

    return {
      network: this.getIPv4SubnetStart(network, prefixLength),
      prefixLength,
    };
  }

  /**
   * Parse CIDR notation (e.g., "192.168.1.0/24")
   */
  static parseCidr(cidr: string): Cidr | null {
    const parts = cidr.split("/");
    if (parts.length !== 2 || !/^\d{1,2}$/.test(parts[1])) return null;

    return this.toCidr(parts[0], parseInt(parts[1], 10));
  }

  static formatCidr(cidr: Cidr): string {
    return `${cidr.network}/${cidr.prefixLength}`;
  }

  /**
   * Check whether the inner block lies entirely within the outer block
   */
  static containsCidr(outer: Cidr, inner: Cidr): boolean {
    if (inner.prefixLength < outer.prefixLength) return false;

    const mask = this.prefixMask(outer.prefixLength);
    return (
      ((this.ipToLong(inner.network) & mask) >>> 0) ===
      ((this.ipToLong(outer.network) & mask) >>> 0)
    );
  }
}
