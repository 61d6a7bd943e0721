/**
 * Import GeoLite2 City CSV data into the Redis geolocation store
 */
import { CsvImportService, ImportOptions } from "../services/csv-import-service";
import { redisClient } from "../services/redis-client";

/**
 * Parse command line arguments
 * (--locations/-l, --ipv4/-4, --dir/-d, --clear/-c)
 */
export function parseImportArgs(argv: string[]): ImportOptions {
  const options: ImportOptions = { clearExisting: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--clear":
      case "-c":
        options.clearExisting = true;
        break;
      case "--locations":
      case "-l":
        options.locationsFile = argv[++i];
        break;
      case "--ipv4":
      case "-4":
        options.ipv4File = argv[++i];
        break;
      case "--dir":
      case "-d":
        options.dataDir = argv[++i];
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

async function runImport() {
  try {
    const options = parseImportArgs(process.argv.slice(2));
    console.log("Import options:", options);

    const summary = await new CsvImportService(redisClient).importData(options);
    console.log(
      `Import completed: ${summary.ranges} ranges from ${summary.locations} locations`
    );
  } finally {
    await redisClient.disconnect();
  }
}

if (require.main === module) {
  runImport().catch((error) => {
    console.error("Error during import:", error);
    process.exit(1);
  });
}
