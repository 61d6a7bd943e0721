import fs from "fs";
import os from "os";
import path from "path";
import { DataSourceError } from "../../src/models/errors";
import {
  isSuffixTreeNode,
  loadSuffixTree,
  parseSuffixList,
} from "../../src/services/suffix-list-loader";
import { registrableDomain } from "../../src/services/suffix-tree";

const FIXTURES = path.join(__dirname, "..", "fixtures");

describe("parseSuffixList", () => {
  test("should build a reversed label tree with exception markers", () => {
    const tree = parseSuffixList(
      ["// comment", "", "com", "co.uk", "*.kobe.jp", "!city.kobe.jp"].join(
        "\n"
      )
    );

    expect(tree).toEqual({
      com: false,
      uk: { co: false },
      jp: { kobe: { "*": false, city: true } },
    });
  });

  test("should promote a rule to an interior node when a longer rule extends it", () => {
    expect(parseSuffixList("com\nblogspot.com")).toEqual({
      com: { blogspot: false },
    });
    expect(parseSuffixList("blogspot.com\ncom")).toEqual({
      com: { blogspot: false },
    });
  });

  test("should read only the first token of each line", () => {
    expect(parseSuffixList("net   some trailing words\r\n")).toEqual({
      net: false,
    });
  });

  test("should convert internationalized labels to ASCII", () => {
    expect(parseSuffixList("公司.cn")).toEqual({
      cn: { "xn--55qx5d": false },
    });
  });

  test("should freeze the resulting tree", () => {
    const tree = parseSuffixList("co.uk");
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.uk)).toBe(true);
  });
});

describe("isSuffixTreeNode", () => {
  test.each([
    [{ com: false }, true],
    [{ uk: { co: false } }, true],
    [{}, true],
    [{ com: "yes" }, false],
    [["com"], false],
    [null, false],
    ["com", false],
  ])("should classify %p as %p", (value, expected) => {
    expect(isSuffixTreeNode(value)).toBe(expected);
  });
});

describe("loadSuffixTree", () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "suffix-tree-"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test("should load the public suffix list format", () => {
    const tree = loadSuffixTree(path.join(FIXTURES, "public_suffix_list.dat"));

    expect(registrableDomain("mail.example.co.uk", tree)).toBe("example.co.uk");
    expect(registrableDomain("www.city.kobe.jp", tree)).toBe("city.kobe.jp");
    expect(registrableDomain("a.b.c.ck", tree)).toBe("b.c.ck");
    expect(registrableDomain("www.ck", tree)).toBe("www.ck");
    expect(registrableDomain("a.site.example-hosting.net", tree)).toBe(
      "site.example-hosting.net"
    );
  });

  test("should load a JSON tree", () => {
    const tree = loadSuffixTree(path.join(FIXTURES, "suffix-tree.json"));

    expect(registrableDomain("www.example.com", tree)).toBe("example.com");
    expect(registrableDomain("a.docs.example-pages.org", tree)).toBe(
      "docs.example-pages.org"
    );
  });

  test("should fail when the file is missing", () => {
    expect(() => loadSuffixTree(path.join(tmpDir, "missing.dat"))).toThrow(
      DataSourceError
    );
  });

  test("should fail on a list with no rules", () => {
    const file = path.join(tmpDir, "empty.dat");
    fs.writeFileSync(file, "// nothing here\n\n");

    expect(() => loadSuffixTree(file)).toThrow(/has no rules/);
  });

  test("should fail on malformed JSON", () => {
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, "{ com: ");

    expect(() => loadSuffixTree(file)).toThrow(/not valid JSON/);
  });

  test("should fail on JSON that is not a label tree", () => {
    const file = path.join(tmpDir, "wrong-shape.json");
    fs.writeFileSync(file, JSON.stringify({ com: 1 }));

    expect(() => loadSuffixTree(file)).toThrow(/not a label tree/);
  });
});
