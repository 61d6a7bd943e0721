import { parseImportArgs } from "../../src/scripts/import-geo";

describe("parseImportArgs", () => {
  test("should default to not clearing existing data", () => {
    expect(parseImportArgs([])).toEqual({ clearExisting: false });
  });

  test("should read long and short options", () => {
    expect(
      parseImportArgs([
        "--clear",
        "-l",
        "locations.csv",
        "--ipv4",
        "blocks.csv",
        "-d",
        "data",
      ])
    ).toEqual({
      clearExisting: true,
      locationsFile: "locations.csv",
      ipv4File: "blocks.csv",
      dataDir: "data",
    });
  });

  test("should reject unknown options", () => {
    expect(() => parseImportArgs(["--ipv6", "x.csv"])).toThrow(
      "Unknown option: --ipv6"
    );
  });
});
