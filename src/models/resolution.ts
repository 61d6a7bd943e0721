/**
 * An IPv4 network block: first address plus prefix length
 */
export interface Cidr {
  network: string;
  prefixLength: number;
}

/**
 * A parsed IPv4 address with the forms the DNS lookups need
 */
export interface Address {
  readonly ip: string;
  readonly reversedLabels: string; // e.g. "7.113.0.203"
  readonly reverseName: string; // e.g. "7.113.0.203.in-addr.arpa"
  readonly cidr: Cidr;
}

export type AbsentReason =
  | "nxdomain"
  | "nodata"
  | "timeout"
  | "unavailable"
  | "malformed"
  | "failure";

/**
 * Outcome of one step in a lookup chain. Steps report a miss through the
 * "absent" variant instead of throwing.
 */
export type Lookup<T> =
  | { kind: "found"; value: T }
  | { kind: "absent"; reason: AbsentReason };

export function found<T>(value: T): Lookup<T> {
  return { kind: "found", value };
}

export function absent<T>(reason: AbsentReason): Lookup<T> {
  return { kind: "absent", reason };
}

export interface AsnRecord {
  number?: string;
  cidr?: Cidr;
  countryCode?: string;
}

export interface NameResult {
  primaryName?: string;
  alternateName?: string;
}

export interface GeoRecord {
  countryCode?: string;
  countryName?: string;
  continentCode?: string;
  region?: string;
  city?: string;
  latitude?: number;
  longitude?: number;
}

export const EMPTY_GEO_RECORD: Readonly<GeoRecord> = Object.freeze({});

export interface ResolutionResult {
  readonly ipAddress: string;
  readonly geo: Readonly<GeoRecord>;
  readonly asn: Readonly<{
    cidr: string;
    number: string;
    countryCode: string;
  }>;
  readonly name: Readonly<{
    domain: string;
    host: string;
    alt: string;
  }>;
}
