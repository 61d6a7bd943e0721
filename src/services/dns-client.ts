import { promises as dns } from "dns";
import { AbsentReason, Lookup, absent, found } from "../models/resolution";

/**
 * Per-query timeout, applied to UDP and TCP transports alike
 */
export const DNS_QUERY_TIMEOUT_MS = 30000;

/**
 * The DNS queries the resolvers issue. Misses come back as "absent" lookups.
 */
export interface DnsClient {
  /** TXT records, each as its list of character-strings */
  queryTxt(name: string): Promise<Lookup<string[][]>>;
  /** PTR targets for a reverse-zone name */
  queryPtr(name: string): Promise<Lookup<string[]>>;
  /** A separate channel whose outstanding queries can be abandoned together */
  session(): DnsSession;
}

export interface DnsSession {
  queryPtr(name: string): Promise<Lookup<string[]>>;
  /** Abort every query still in flight on this session */
  cancel(): void;
}

type ResolverLike = Pick<dns.Resolver, "resolveTxt" | "resolvePtr" | "cancel">;

/**
 * Resolver factory honoring the configured servers and query timeout
 */
export function nodeResolverFactory(servers: string[]): () => ResolverLike {
  return () => {
    const resolver = new dns.Resolver({
      timeout: DNS_QUERY_TIMEOUT_MS,
      tries: 1,
    });
    if (servers.length > 0) {
      resolver.setServers(servers);
    }
    return resolver;
  };
}

/**
 * Map a resolver error code onto the reason a lookup came back empty
 */
export function reasonForError(error: unknown): AbsentReason {
  const code =
    error instanceof Error && "code" in error ? String(error.code) : "";

  switch (code) {
    case "ENOTFOUND":
      return "nxdomain";
    case "ENODATA":
      return "nodata";
    case "ETIMEOUT":
    case "ECANCELLED":
      return "timeout";
    case "ESERVFAIL":
    case "EREFUSED":
    case "ECONNREFUSED":
      return "unavailable";
    case "EBADRESP":
    case "EFORMERR":
      return "malformed";
    default:
      return "failure";
  }
}

/**
 * DnsClient backed by Node's c-ares resolver
 */
export class NodeDnsClient implements DnsClient {
  private readonly resolver: ResolverLike;

  constructor(
    private readonly createResolver: () => ResolverLike = nodeResolverFactory([])
  ) {
    this.resolver = createResolver();
  }

  async queryTxt(name: string): Promise<Lookup<string[][]>> {
    try {
      const records = await this.resolver.resolveTxt(name);
      return records.length > 0 ? found(records) : absent("nodata");
    } catch (error) {
      return this.toAbsent(name, "TXT", error);
    }
  }

  async queryPtr(name: string): Promise<Lookup<string[]>> {
    return this.resolvePtr(this.resolver, name);
  }

  session(): DnsSession {
    const resolver = this.createResolver();
    return {
      queryPtr: (name) => this.resolvePtr(resolver, name),
      cancel: () => resolver.cancel(),
    };
  }

  private async resolvePtr(
    resolver: ResolverLike,
    name: string
  ): Promise<Lookup<string[]>> {
    try {
      const targets = await resolver.resolvePtr(name);
      return targets.length > 0 ? found(targets) : absent("nodata");
    } catch (error) {
      return this.toAbsent(name, "PTR", error);
    }
  }

  private toAbsent<T>(name: string, type: string, error: unknown): Lookup<T> {
    const reason = reasonForError(error);
    if (reason === "failure") {
      console.error(`Unexpected ${type} lookup error for ${name}:`, error);
    }
    return absent(reason);
  }
}
