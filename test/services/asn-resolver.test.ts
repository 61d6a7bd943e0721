import { AsnResolver } from "../../src/services/asn-resolver";
import { IpUtil } from "../../src/services/ip-util";
import { FakeDnsClient } from "../fixtures/dns-fixture";

const REGISTRIES = { registryA: "registry-a.test", registryB: "registry-b.test" };
const address = IpUtil.parseAddress("203.0.113.7");

describe("AsnResolver", () => {
  let dns: FakeDnsClient;
  let resolver: AsnResolver;

  beforeEach(() => {
    dns = new FakeDnsClient();
    resolver = new AsnResolver(dns, REGISTRIES);
  });

  test("should read asn and cidr from a three-field registry A answer", async () => {
    dns
      .setTxt("7.113.0.203.asn.registry-a.test", [["64500", "203.0.113.0", "24"]])
      .setTxt("as64500.asn.registry-b.test", [
        ["64500 | US | arin | 2001-01-01 | EXAMPLE-NET, US"],
      ]);

    await expect(resolver.resolve(address)).resolves.toEqual({
      number: "64500",
      cidr: { network: "203.0.113.0", prefixLength: 24 },
      countryCode: "US",
    });
    expect(dns.queries).toEqual([
      "7.113.0.203.asn.registry-a.test",
      "as64500.asn.registry-b.test",
    ]);
  });

  test("should fall back to registry B when registry A has no answer", async () => {
    dns
      .setTxt("7.113.0.203.origin.asn.registry-b.test", [
        ["64501 | 203.0.112.0/22 | NL | ripencc | 2010-05-05"],
      ])
      .setTxt("as64501.asn.registry-b.test", [["64501 | NL | ripencc | 2010-05-05 | X"]]);

    await expect(resolver.resolve(address)).resolves.toEqual({
      number: "64501",
      cidr: { network: "203.0.112.0", prefixLength: 22 },
      countryCode: "NL",
    });
    expect(dns.queries).toEqual([
      "7.113.0.203.asn.registry-a.test",
      "7.113.0.203.origin.asn.registry-b.test",
      "as64501.asn.registry-b.test",
    ]);
  });

  test("should fall back to registry B when registry A answers with the wrong shape", async () => {
    dns
      .setTxt("7.113.0.203.asn.registry-a.test", [["4294967295", "0"]])
      .setTxt("7.113.0.203.origin.asn.registry-b.test", [
        ["64502 | 203.0.113.0/24 | JP | apnic | 2015-01-01"],
      ]);

    const record = await resolver.resolve(address);

    expect(record.number).toBe("64502");
    expect(record.countryCode).toBeUndefined();
  });

  test("should fall back to registry B when registry A times out", async () => {
    dns
      .setTxt("7.113.0.203.asn.registry-a.test", "timeout")
      .setTxt("7.113.0.203.origin.asn.registry-b.test", [
        ["64503 | 203.0.113.0/24 | DE | ripencc | 2015-01-01"],
      ]);

    expect((await resolver.resolve(address)).number).toBe("64503");
  });

  test("should take the first origin when registry B lists several", async () => {
    dns.setTxt("7.113.0.203.origin.asn.registry-b.test", [
      ["64504 64505 | 203.0.113.0/24 | US | arin | 2015-01-01"],
    ]);

    expect((await resolver.resolve(address)).number).toBe("64504");
  });

  test("should ignore registry B answers with more than one record", async () => {
    dns.setTxt("7.113.0.203.origin.asn.registry-b.test", [
      ["64504 | 203.0.113.0/24 | US | arin | 2015-01-01"],
      ["64505 | 203.0.113.0/25 | US | arin | 2015-01-01"],
    ]);

    await expect(resolver.resolve(address)).resolves.toEqual({});
  });

  test("should return an empty record and skip the country query when both registries miss", async () => {
    dns.setTxt("7.113.0.203.origin.asn.registry-b.test", "nodata");

    await expect(resolver.resolve(address)).resolves.toEqual({});
    expect(dns.queries).toHaveLength(2);
  });

  test("should keep the asn when the prefix is not a usable cidr", async () => {
    dns.setTxt("7.113.0.203.asn.registry-a.test", [["64506", "203.0.113.0", "99"]]);

    await expect(resolver.resolve(address)).resolves.toEqual({ number: "64506" });
  });

  test("should leave the country absent when its answer is malformed", async () => {
    dns
      .setTxt("7.113.0.203.asn.registry-a.test", [["64507", "203.0.113.0", "24"]])
      .setTxt("as64507.asn.registry-b.test", [["no pipes here"]]);

    await expect(resolver.resolve(address)).resolves.toEqual({
      number: "64507",
      cidr: { network: "203.0.113.0", prefixLength: 24 },
    });
  });
});
