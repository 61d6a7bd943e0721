import { ResolutionResult } from "../models/resolution";

export const PLACEHOLDER = "-";

function orPlaceholder(value: string | undefined): string {
  return value ? value : PLACEHOLDER;
}

function coordinate(value: number | undefined): string {
  return value === undefined ? PLACEHOLDER : value.toFixed(4);
}

/**
 * Render one result as a tab-separated line:
 * ip, asnCC:asn:cidr, country code, domain, lat,lon, host/alt, location
 */
export function formatResult(result: ResolutionResult): string {
  const { asn, geo, name } = result;

  return [
    result.ipAddress,
    [asn.countryCode, asn.number, asn.cidr].map(orPlaceholder).join(":"),
    orPlaceholder(geo.countryCode),
    orPlaceholder(name.domain),
    `${coordinate(geo.latitude)},${coordinate(geo.longitude)}`,
    `${orPlaceholder(name.host)}/${orPlaceholder(name.alt)}`,
    [geo.countryName, geo.region, geo.city].map(orPlaceholder).join(", "),
  ].join("\t");
}
