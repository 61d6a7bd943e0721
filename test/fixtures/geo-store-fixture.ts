import { GeoStoreClient } from "../../src/services/geo-lookup-service";
import { GeoStoreWriter } from "../../src/services/csv-import-service";

/**
 * In-memory stand-in for the Redis hashes behind the geolocation store
 */
export class InMemoryGeoStore implements GeoStoreClient, GeoStoreWriter {
  public readonly hashes = new Map<string, Record<string, string>>();
  public connected = false;

  async ensureConnection(): Promise<void> {
    this.connected = true;
  }

  async hSetAll(
    key: string,
    values: Record<string, string | number>
  ): Promise<number> {
    const hash = this.hashes.get(key) || {};
    let added = 0;
    for (const [field, value] of Object.entries(values)) {
      if (!(field in hash)) added++;
      hash[field] = String(value);
    }
    this.hashes.set(key, hash);
    return added;
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    return { ...(this.hashes.get(key) || {}) };
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const prefix = pattern.replace(/\*$/, "");
    return [...this.hashes.keys()].filter((key) => key.startsWith(prefix));
  }

  async del(keys: string[]): Promise<number> {
    return keys.filter((key) => this.hashes.delete(key)).length;
  }
}
