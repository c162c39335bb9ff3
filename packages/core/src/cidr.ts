import ipaddr from "ipaddr.js";

export type Subnet = {
  /** Normalized notation, base address masked down to the network address. */
  cidr: string;
  network: number;
  broadcast: number;
  prefix: number;
};

export const DEFAULT_MAX_HOSTS = 1024;

export class SubnetError extends Error {
  readonly subnet: string;

  constructor(subnet: string, message: string) {
    super(message);
    this.name = "SubnetError";
    this.subnet = subnet;
  }
}

// Dotted-quad only: "10.1", "0x0a.0.0.1" and zero-padded octets are rejected.
export function isIPv4(value: string): boolean {
  return ipaddr.IPv4.isValidFourPartDecimal(value);
}

export function isIPAddress(value: string): boolean {
  return isIPv4(value) || ipaddr.IPv6.isValid(value);
}

// IPv6 in RFC 5952 form, so "2001:DB8:0::1" and "2001:db8::1" compare equal.
export function normalizeIPAddress(value: string): string {
  return isIPv4(value) ? value : ipaddr.IPv6.parse(value).toRFC5952String();
}

export function isSubnetNotation(value: string): boolean {
  return value.includes("/");
}

export function ipv4ToNumber(value: string): number {
  const bytes = ipaddr.IPv4.parse(value).toByteArray();
  return bytes.reduce((acc, byte) => ((acc << 8) | byte) >>> 0, 0);
}

export function numberToIPv4(value: number): string {
  return [value >>> 24, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join(".");
}

function prefixMask(prefix: number): number {
  if (prefix === 0) {
    return 0;
  }
  return (0xffffffff << (32 - prefix)) >>> 0;
}

export function parseSubnet(cidr: string): Subnet | null {
  const trimmed = cidr.trim();
  const slash = trimmed.indexOf("/");
  if (slash <= 0) {
    return null;
  }
  const address = trimmed.slice(0, slash);
  const prefixText = trimmed.slice(slash + 1);
  if (!isIPv4(address) || !/^\d{1,2}$/.test(prefixText)) {
    return null;
  }
  const prefix = Number.parseInt(prefixText, 10);
  if (prefix > 32) {
    return null;
  }
  const mask = prefixMask(prefix);
  const network = (ipv4ToNumber(address) & mask) >>> 0;
  const broadcast = (network | (~mask >>> 0)) >>> 0;
  return { cidr: `${numberToIPv4(network)}/${prefix}`, network, broadcast, prefix };
}

// /31 links have no network or broadcast address (RFC 3021); /32 is the host itself.
export function usableHostCount(prefix: number): number {
  if (prefix >= 32) {
    return 1;
  }
  if (prefix === 31) {
    return 2;
  }
  return 2 ** (32 - prefix) - 2;
}

export function hostRange(subnet: Subnet): { first: number; last: number } {
  if (subnet.prefix >= 31) {
    return { first: subnet.network, last: subnet.broadcast };
  }
  return { first: subnet.network + 1, last: subnet.broadcast - 1 };
}

// Expand a subnet into its usable host addresses.
export function expandSubnet(cidr: string, options: { maxHosts?: number } = {}): string[] {
  const subnet = parseSubnet(cidr);
  if (!subnet) {
    throw new SubnetError(cidr, `Invalid IPv4 subnet "${cidr}"; expected a.b.c.d/n with n between 0 and 32.`);
  }
  const maxHosts = options.maxHosts ?? DEFAULT_MAX_HOSTS;
  const count = usableHostCount(subnet.prefix);
  if (count > maxHosts) {
    throw new SubnetError(
      cidr,
      `Subnet ${subnet.cidr} expands to ${count} hosts, more than the limit of ${maxHosts} (raise it with --max-hosts).`
    );
  }
  const { first, last } = hostRange(subnet);
  const hosts: string[] = [];
  for (let value = first; value <= last; value += 1) {
    hosts.push(numberToIPv4(value));
  }
  return hosts;
}
