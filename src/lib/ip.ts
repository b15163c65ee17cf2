/**
 * Address and network helpers used for host validation and reverse zone
 * derivation. Parsing leans on `net.isIP` and expands IPv6 shorthand into
 * bytes so prefixes can be compared bit by bit.
 */
import net from "node:net";
import type { IpAddress, IpNetwork } from "@/types/zone";

const IPV4_MAPPED = /^(.*:)(\d+\.\d+\.\d+\.\d+)$/;

/**
 * Expand shorthand `::` and return the eight hextets of an IPv6 address.
 * A trailing dotted IPv4 part (e.g. `::ffff:192.0.2.1`) becomes two hextets.
 */
function expandIPv6(addr: string): number[] {
  let text = addr;
  const mapped = IPV4_MAPPED.exec(text);
  if (mapped) {
    const octets = mapped[2].split(".").map(Number);
    const hex1 = ((octets[0] << 8) | octets[1]).toString(16);
    const hex2 = ((octets[2] << 8) | octets[3]).toString(16);
    text = `${mapped[1]}${hex1}:${hex2}`;
  }
  const parts = text.split("::");
  if (parts.length === 1) {
    return text.split(":").map((h) => parseInt(h, 16));
  }
  const left = parts[0] ? parts[0].split(":") : [];
  const right = parts[1] ? parts[1].split(":") : [];
  const missing = 8 - (left.length + right.length);
  const zeros: string[] = new Array<string>(missing).fill("0");
  return [...left, ...zeros, ...right].map((h) => parseInt(h, 16));
}

function hextets(bytes: number[]): number[] {
  const out: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    out.push((bytes[i] << 8) | bytes[i + 1]);
  }
  return out;
}

/** RFC 5952 text: lowercase, no leading zeros, longest zero run as `::` */
function formatIPv6(bytes: number[]): string {
  const groups = hextets(bytes);
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < groups.length; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }
  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(":");
  const head = hex.slice(0, bestStart).join(":");
  const tail = hex.slice(bestStart + bestLen).join(":");
  return `${head}::${tail}`;
}

function formatBytes(version: 4 | 6, bytes: number[]): string {
  return version === 4 ? bytes.join(".") : formatIPv6(bytes);
}

/**
 * Parse an IPv4 or IPv6 address. Returns `undefined` for anything `net.isIP`
 * rejects and for scoped addresses (`fe80::1%eth0`).
 */
export function parseIpAddress(text: string): IpAddress | undefined {
  if (text.includes("%")) return undefined;
  const version = net.isIP(text);
  if (version === 4) {
    const bytes = text.split(".").map(Number);
    return { version: 4, bytes, text: formatBytes(4, bytes) };
  }
  if (version === 6) {
    const bytes = expandIPv6(text).flatMap((h) => [(h >> 8) & 0xff, h & 0xff]);
    return { version: 6, bytes, text: formatBytes(6, bytes) };
  }
  return undefined;
}

export type NetworkParseResult =
  | { ok: true; network: IpNetwork }
  | { ok: false; problem: string };

/**
 * Parse `address/prefix` notation. Host bits in the address are cleared so
 * `192.168.1.7/24` yields the network `192.168.1.0/24`.
 */
export function parseIpNetwork(text: string): NetworkParseResult {
  const parts = text.split("/");
  if (parts.length !== 2) {
    return {
      ok: false,
      problem: `'${text}' is not a valid IP network (expected address/prefix, e.g. '192.168.0.0/16')`,
    };
  }
  const address = parseIpAddress(parts[0]);
  if (!address) {
    return { ok: false, problem: `'${parts[0]}' is not a valid IP address` };
  }
  const maxPrefix = address.version === 4 ? 32 : 128;
  if (!/^\d{1,3}$/.test(parts[1]) || Number(parts[1]) > maxPrefix) {
    return {
      ok: false,
      problem: `'${parts[1]}' is not a valid prefix length for IPv${address.version} (0-${maxPrefix})`,
    };
  }
  const prefix = Number(parts[1]);
  const bytes = address.bytes.map((b, i) => b & byteMask(prefix, i));
  return {
    ok: true,
    network: {
      version: address.version,
      bytes,
      prefix,
      cidr: `${formatBytes(address.version, bytes)}/${prefix}`,
    },
  };
}

/** Mask for byte `index` of an address under a prefix of `prefix` bits */
function byteMask(prefix: number, index: number): number {
  const bits = Math.min(8, Math.max(0, prefix - index * 8));
  return (0xff << (8 - bits)) & 0xff;
}

export function networkContains(network: IpNetwork, address: IpAddress): boolean {
  if (network.version !== address.version) return false;
  return network.bytes.every(
    (b, i) => (address.bytes[i] & byteMask(network.prefix, i)) === b,
  );
}

export function networksOverlap(a: IpNetwork, b: IpNetwork): boolean {
  if (a.version !== b.version) return false;
  const shorter = a.prefix <= b.prefix ? a : b;
  const longer = shorter === a ? b : a;
  return networkContains(shorter, {
    version: longer.version,
    bytes: longer.bytes,
    text: longer.cidr,
  });
}

function nibbles(bytes: number[]): string[] {
  return bytes.flatMap((b) => [(b >> 4).toString(16), (b & 0x0f).toString(16)]);
}

/**
 * Name of the reverse zone that delegates a network: the whole octets
 * (IPv4) or nibbles (IPv6) covered by the prefix, reversed.
 */
export function reverseZoneName(network: IpNetwork): string {
  if (network.version === 4) {
    const octets = network.bytes.slice(0, Math.floor(network.prefix / 8));
    return [...octets.reverse().map(String), "in-addr.arpa."].join(".");
  }
  const parts = nibbles(network.bytes).slice(0, Math.floor(network.prefix / 4));
  return [...parts.reverse(), "ip6.arpa."].join(".");
}

/** Fully qualified PTR owner of an address */
export function reversePointerName(address: IpAddress): string {
  if (address.version === 4) {
    return [...[...address.bytes].reverse().map(String), "in-addr.arpa."].join(".");
  }
  return [...nibbles(address.bytes).reverse(), "ip6.arpa."].join(".");
}

/** Sort order used by the renderers: IPv4 before IPv6, then byte order */
export function compareAddresses(a: IpAddress, b: IpAddress): number {
  if (a.version !== b.version) return a.version - b.version;
  for (let i = 0; i < a.bytes.length; i++) {
    if (a.bytes[i] !== b.bytes[i]) return a.bytes[i] - b.bytes[i];
  }
  return 0;
}
