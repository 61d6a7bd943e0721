import fs from "fs";
import path from "path";
import csv from "csv-parser";
import { IpUtil } from "./ip-util";
import { GEO_RANGE_PREFIX, RangeSearchUtil } from "./range-search-util";
import { RedisClient } from "./redis-client";

export interface GeoLocation {
  geonameId: string;
  continentCode: string;
  countryCode: string;
  countryName: string;
  region: string;
  city: string;
}

export interface ImportOptions {
  locationsFile?: string;
  ipv4File?: string;
  dataDir?: string;
  clearExisting?: boolean;
}

export interface ImportSummary {
  locations: number;
  ranges: number;
  skipped: number;
}

export type GeoStoreWriter = Pick<
  RedisClient,
  "ensureConnection" | "hSetAll" | "scanKeys" | "del"
>;

type CsvRow = Record<string, string>;

function isCsvRow(value: unknown): value is CsvRow {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((field) => typeof field === "string")
  );
}

/**
 * Read a CSV file row by row
 */
async function* readRows(filePath: string): AsyncGenerator<CsvRow> {
  for await (const row of fs.createReadStream(filePath).pipe(csv())) {
    if (isCsvRow(row)) yield row;
  }
}

/**
 * Loads GeoLite2/GeoIP2 City CSV files (locations + IPv4 blocks) into the
 * Redis range layout the geolocation lookups read
 */
export class CsvImportService {
  private static readonly DEFAULT_DATA_DIR = path.join(process.cwd(), "data");

  constructor(private readonly store: GeoStoreWriter) {}

  public async importData(options: ImportOptions = {}): Promise<ImportSummary> {
    console.log("Starting GeoIP data import...");

    const dataDir = options.dataDir || CsvImportService.DEFAULT_DATA_DIR;
    const files = this.resolveFiles(options, dataDir);

    if (!files.locationsFile) {
      throw new Error("Locations file not found or specified");
    }
    if (!files.ipv4File) {
      throw new Error("IPv4 blocks file not found or specified");
    }

    await this.store.ensureConnection();

    if (options.clearExisting) {
      await this.clearExistingData();
    }

    console.log(`Processing locations file: ${files.locationsFile}`);
    const locations = await this.loadLocations(files.locationsFile);
    console.log(`Loaded ${locations.size} locations`);

    console.log(`Processing IPv4 blocks file: ${files.ipv4File}`);
    const { ranges, skipped } = await this.importIpv4Blocks(
      files.ipv4File,
      locations
    );
    console.log(`Imported ${ranges} IPv4 blocks (${skipped} skipped)`);

    return { locations: locations.size, ranges, skipped };
  }

  /**
   * Resolve file paths from options, falling back to the data directory
   */
  private resolveFiles(
    options: ImportOptions,
    dataDir: string
  ): { locationsFile?: string; ipv4File?: string } {
    const files = {
      locationsFile: options.locationsFile,
      ipv4File: options.ipv4File,
    };

    if (!fs.existsSync(dataDir)) {
      console.log(`Data directory ${dataDir} not found`);
      return files;
    }

    const dirFiles = fs.readdirSync(dataDir);

    if (!files.locationsFile) {
      const locationFile = dirFiles.find(
        (f) => /city.*locations/i.test(f) && f.endsWith(".csv")
      );
      if (locationFile) {
        files.locationsFile = path.join(dataDir, locationFile);
      }
    }

    if (!files.ipv4File) {
      const ipv4File = dirFiles.find(
        (f) => /blocks.*ipv4/i.test(f) && f.endsWith(".csv")
      );
      if (ipv4File) {
        files.ipv4File = path.join(dataDir, ipv4File);
      }
    }

    return files;
  }

  /**
   * Remove previously imported ranges
   */
  private async clearExistingData(): Promise<void> {
    console.log("Clearing existing GeoIP data...");
    const keys = await this.store.scanKeys(`${GEO_RANGE_PREFIX}*`);
    const cleared = await this.store.del(keys);
    console.log(`Cleared ${cleared} keys from Redis`);
  }

  /**
   * Map geoname_id to location from the City-Locations file
   */
  private async loadLocations(
    filePath: string
  ): Promise<Map<string, GeoLocation>> {
    const locations = new Map<string, GeoLocation>();

    for await (const row of readRows(filePath)) {
      if (!row.geoname_id) continue;

      locations.set(row.geoname_id, {
        geonameId: row.geoname_id,
        continentCode: row.continent_code || "",
        countryCode: row.country_iso_code || "",
        countryName: row.country_name || "",
        region: row.subdivision_1_name || "",
        city: row.city_name || "",
      });
    }

    return locations;
  }

  private async importIpv4Blocks(
    filePath: string,
    locations: Map<string, GeoLocation>
  ): Promise<{ ranges: number; skipped: number }> {
    let ranges = 0;
    let skipped = 0;

    for await (const row of readRows(filePath)) {
      const block = IpUtil.parseCidr(row.network || "");
      const location =
        locations.get(row.geoname_id) ||
        locations.get(row.registered_country_geoname_id);

      if (!block || !location) {
        skipped++;
        continue;
      }

      const startIp = IpUtil.ipToLong(block.network);
      const endIp = IpUtil.ipToLong(
        IpUtil.getIPv4SubnetEnd(block.network, block.prefixLength)
      );

      await this.store.hSetAll(RangeSearchUtil.rangeKey(startIp, endIp), {
        continentCode: location.continentCode,
        countryCode: location.countryCode,
        countryName: location.countryName,
        region: location.region,
        city: location.city,
        latitude: row.latitude || "",
        longitude: row.longitude || "",
      });
      ranges++;

      if (ranges % 10000 === 0) {
        console.log(`Processed ${ranges} IPv4 blocks...`);
      }
    }

    return { ranges, skipped };
  }
}
