import { Address, Cidr } from "../models/resolution";
import { IpUtil } from "./ip-util";

/**
 * IANA-reserved IPv4 networks, checked in this order
 */
export const RESERVED_BLOCKS: readonly Readonly<Cidr>[] = Object.freeze(
  [
    { network: "0.0.0.0", prefixLength: 8 },
    { network: "10.0.0.0", prefixLength: 8 },
    { network: "127.0.0.0", prefixLength: 8 },
    { network: "169.254.0.0", prefixLength: 16 },
    { network: "172.16.0.0", prefixLength: 12 },
    { network: "192.168.0.0", prefixLength: 16 },
  ].map((block) => Object.freeze(block))
);

export const RESERVED_ASN = "RESERVED";
export const RESERVED_COUNTRY_CODE = "--";

/**
 * Return the first reserved block that fully contains the address, or null
 */
export function findReservedBlock(
  address: Address,
  blocks: readonly Readonly<Cidr>[] = RESERVED_BLOCKS
): Readonly<Cidr> | null {
  return (
    blocks.find((block) => IpUtil.containsCidr(block, address.cidr)) || null
  );
}
