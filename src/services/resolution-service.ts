import {
  Address,
  AsnRecord,
  Cidr,
  EMPTY_GEO_RECORD,
  GeoRecord,
  NameResult,
  ResolutionResult,
} from "../models/resolution";
import { AsnResolver } from "./asn-resolver";
import { GeoLocator } from "./geo-lookup-service";
import { IpUtil } from "./ip-util";
import { NameResolver } from "./name-resolver";
import {
  RESERVED_ASN,
  RESERVED_BLOCKS,
  RESERVED_COUNTRY_CODE,
  findReservedBlock,
} from "./reserved-blocks";
import { SuffixTreeNode, registrableDomain } from "./suffix-tree";

/**
 * Long-lived collaborators shared by every resolution
 */
export interface ResolutionContext {
  asnResolver: AsnResolver;
  nameResolver: NameResolver;
  suffixTree: SuffixTreeNode;
  geoLocator: GeoLocator;
  reservedBlocks?: readonly Readonly<Cidr>[];
}

interface Ownership {
  asn: AsnRecord;
  names: NameResult;
  domain?: string;
}

/**
 * Builds one ResolutionResult per address from the reserved-block check, ASN
 * and name lookups, the suffix tree and the geolocation store
 */
export class ResolutionService {
  private readonly reservedBlocks: readonly Readonly<Cidr>[];

  constructor(private readonly context: ResolutionContext) {
    this.reservedBlocks = context.reservedBlocks || RESERVED_BLOCKS;
  }

  /**
   * Resolve a textual IPv4 address. Throws InvalidIpAddressError for
   * malformed input; lookup misses only leave fields empty.
   */
  async resolve(input: string): Promise<ResolutionResult> {
    const address = IpUtil.parseAddress(input);
    const ownership = await this.resolveOwnership(address);

    const { asn, names } = ownership;
    let domain = ownership.domain || "";
    let host = "";
    let alt = "";

    if (names.primaryName) {
      host = names.primaryName.toLowerCase().replace(/\.$/, "");
      domain = domain || registrableDomain(host, this.context.suffixTree);
    } else if (names.alternateName) {
      alt = names.alternateName.toLowerCase().replace(/\.$/, "");
      domain = domain || registrableDomain(alt, this.context.suffixTree);
    }

    if (!domain && asn.number) {
      domain = `#AS${asn.number}`;
    }

    const geo = await this.lookupGeo(address.ip);

    return Object.freeze({
      ipAddress: address.ip,
      geo: Object.freeze({ ...geo }),
      asn: Object.freeze({
        cidr: asn.cidr ? IpUtil.formatCidr(asn.cidr) : "",
        number: asn.number || "",
        countryCode: asn.countryCode || "",
      }),
      name: Object.freeze({
        domain: domain || `#${address.ip}`,
        host: host || address.ip,
        alt,
      }),
    });
  }

  private async resolveOwnership(address: Address): Promise<Ownership> {
    const reserved = findReservedBlock(address, this.reservedBlocks);
    if (reserved) {
      return {
        asn: {
          number: RESERVED_ASN,
          cidr: reserved,
          countryCode: RESERVED_COUNTRY_CODE,
        },
        names: {},
        domain: IpUtil.formatCidr(reserved),
      };
    }

    const asn = await this.context.asnResolver.resolve(address);
    const names = await this.context.nameResolver.resolve(address, asn.cidr);
    return { asn, names };
  }

  private async lookupGeo(ip: string): Promise<GeoRecord> {
    try {
      return (await this.context.geoLocator.lookup(ip)) || EMPTY_GEO_RECORD;
    } catch (error) {
      console.error(`Geolocation lookup failed for ${ip}:`, error);
      return EMPTY_GEO_RECORD;
    }
  }
}
