/**
 * Raised for address input that is not a valid IPv4 literal
 */
export class InvalidIpAddressError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid IP address: ${input}`);
    this.name = "InvalidIpAddressError";
  }
}

/**
 * Raised at start-up when a data source the resolver depends on is missing
 * or unreadable
 */
export class DataSourceError extends Error {
  constructor(message: string, public readonly reason?: unknown) {
    super(message);
    this.name = "DataSourceError";
  }
}
