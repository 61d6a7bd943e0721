import {
  Address,
  AsnRecord,
  Cidr,
  Lookup,
  absent,
  found,
} from "../models/resolution";
import { DnsClient } from "./dns-client";
import { IpUtil } from "./ip-util";

export interface AsnRegistries {
  /** Answers `<reversed-ip>.asn.<domain>` with TXT ("asn", "network", "width") */
  registryA: string;
  /** Answers `<reversed-ip>.origin.asn.<domain>` and `as<asn>.asn.<domain>` */
  registryB: string;
}

interface Origin {
  number: string;
  cidr?: Cidr;
}

const ORIGIN_PATTERN = /^\s*(\d+)(?:\s+\d+)*\s*\|\s*([\d.]+)\/(\d{1,2})\s*\|/;
const COUNTRY_PATTERN = /^\s*\d+\s*\|\s*([A-Za-z]{2})\s*\|/;

/**
 * Resolves the origin AS, announced prefix and AS country for an address
 * through DNS-based ASN registries
 */
export class AsnResolver {
  constructor(
    private readonly dns: DnsClient,
    private readonly registries: AsnRegistries
  ) {}

  async resolve(address: Address): Promise<AsnRecord> {
    const origin = await this.firstFound([
      () => this.queryRegistryA(address),
      () => this.queryRegistryB(address),
    ]);

    if (origin.kind === "absent") {
      return {};
    }

    const record: AsnRecord = { number: origin.value.number };
    if (origin.value.cidr) {
      record.cidr = origin.value.cidr;
    }

    const country = await this.queryCountry(origin.value.number);
    if (country.kind === "found") {
      record.countryCode = country.value;
    }

    return record;
  }

  /**
   * Run attempts in order, stopping at the first one that finds something
   */
  private async firstFound<T>(
    attempts: Array<() => Promise<Lookup<T>>>
  ): Promise<Lookup<T>> {
    let last: Lookup<T> = absent("nodata");
    for (const attempt of attempts) {
      last = await attempt();
      if (last.kind === "found") break;
    }
    return last;
  }

  private async queryRegistryA(address: Address): Promise<Lookup<Origin>> {
    const answer = await this.dns.queryTxt(
      `${address.reversedLabels}.asn.${this.registries.registryA}`
    );
    if (answer.kind === "absent") return answer;

    const fields = answer.value[0] || [];
    if (fields.length !== 3 || !/^\d+$/.test(fields[0])) {
      return absent("malformed");
    }

    const [number, network, width] = fields;
    const cidr = /^\d{1,2}$/.test(width)
      ? IpUtil.toCidr(network, parseInt(width, 10))
      : null;

    return found(cidr ? { number, cidr } : { number });
  }

  private async queryRegistryB(address: Address): Promise<Lookup<Origin>> {
    const answer = await this.dns.queryTxt(
      `${address.reversedLabels}.origin.asn.${this.registries.registryB}`
    );
    if (answer.kind === "absent") return answer;
    if (answer.value.length !== 1) return absent("malformed");

    const match = ORIGIN_PATTERN.exec(answer.value[0].join(""));
    if (!match) return absent("malformed");

    const cidr = IpUtil.toCidr(match[2], parseInt(match[3], 10));
    return found(cidr ? { number: match[1], cidr } : { number: match[1] });
  }

  private async queryCountry(asn: string): Promise<Lookup<string>> {
    const answer = await this.dns.queryTxt(
      `as${asn}.asn.${this.registries.registryB}`
    );
    if (answer.kind === "absent") return answer;
    if (answer.value.length !== 1) return absent("malformed");

    const match = COUNTRY_PATTERN.exec(answer.value[0].join(""));
    return match ? found(match[1].toUpperCase()) : absent("malformed");
  }
}
