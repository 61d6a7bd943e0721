import {
  Address,
  Cidr,
  Lookup,
  NameResult,
  absent,
  found,
} from "../models/resolution";
import { DnsClient, DnsSession } from "./dns-client";
import { IpUtil } from "./ip-util";

/**
 * Wall-clock budget for the neighborhood scan, measured from its start
 */
export const SCAN_DEADLINE_MS = 60000;

/**
 * Blocks with a longer prefix than this are scanned whole; shorter ones only
 * over their first /24
 */
export const WHOLE_BLOCK_SCAN_PREFIX = 18;

export interface NameResolverOptions {
  scanDeadlineMs?: number;
  now?: () => number;
}

/**
 * Finds a display name for an address: its own PTR record first, then the
 * PTR of its announced block's base address, then the first neighbor in the
 * block that has one
 */
export class NameResolver {
  private readonly scanDeadlineMs: number;
  private readonly now: () => number;

  constructor(
    private readonly dns: DnsClient,
    options: NameResolverOptions = {}
  ) {
    this.scanDeadlineMs = options.scanDeadlineMs ?? SCAN_DEADLINE_MS;
    this.now = options.now ?? Date.now;
  }

  async resolve(address: Address, cidr?: Cidr): Promise<NameResult> {
    const direct = await this.lookupName(this.dns, address.reverseName);
    if (direct.kind === "found") {
      return { primaryName: direct.value };
    }

    if (!cidr) {
      return {};
    }

    const base = await this.queryPtr(this.dns, cidr.network);
    if (base.kind === "found") {
      return { alternateName: base.value };
    }

    // The base address was just asked for
    const neighbor = await this.scanNeighborhood(cidr, 1);
    return neighbor.kind === "found" ? { alternateName: neighbor.value } : {};
  }

  /**
   * First address and number of candidates the scan visits for a block
   */
  static scanRange(cidr: Cidr): { first: number; size: number } {
    const first = IpUtil.ipToLong(cidr.network);
    if (cidr.prefixLength > WHOLE_BLOCK_SCAN_PREFIX) {
      return { first, size: IpUtil.calculateIPv4SubnetSize(cidr.prefixLength) };
    }
    return { first, size: IpUtil.calculateIPv4SubnetSize(24) };
  }

  /**
   * Query candidates in ascending order, from `startOffset` into the scan
   * range, until one answers or the deadline passes. A query still in flight
   * at the deadline is cancelled on the resolver as well.
   */
  async scanNeighborhood(
    cidr: Cidr,
    startOffset: number = 0
  ): Promise<Lookup<string>> {
    const deadline = this.now() + this.scanDeadlineMs;
    const { first, size } = NameResolver.scanRange(cidr);
    const session = this.dns.session();

    for (let offset = startOffset; offset < size; offset++) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        console.log(
          `PTR scan of ${IpUtil.formatCidr(cidr)} stopped after ${offset - startOffset} candidates`
        );
        return absent("timeout");
      }

      const candidate = IpUtil.longToIp(first + offset);
      const answer = await this.withDeadline(
        this.queryPtr(session, candidate),
        remaining,
        session
      );
      if (answer.kind === "found") {
        return answer;
      }
    }

    return absent("nxdomain");
  }

  private queryPtr(
    channel: Pick<DnsClient, "queryPtr">,
    ip: string
  ): Promise<Lookup<string>> {
    return this.lookupName(channel, IpUtil.reverseName(ip));
  }

  private async lookupName(
    channel: Pick<DnsClient, "queryPtr">,
    reverseName: string
  ): Promise<Lookup<string>> {
    const answer = await channel.queryPtr(reverseName);
    if (answer.kind === "absent") return answer;

    const name = (answer.value[0] || "").replace(/\.$/, "");
    return name ? found(name) : absent("malformed");
  }

  private async withDeadline<T>(
    lookup: Promise<Lookup<T>>,
    ms: number,
    session: DnsSession
  ): Promise<Lookup<T>> {
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<Lookup<T>>((resolve) => {
      timer = setTimeout(() => {
        session.cancel();
        resolve(absent("timeout"));
      }, ms);
    });

    try {
      return await Promise.race([lookup, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }
}
