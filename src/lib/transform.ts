/**
 * Record transformer.
 *
 * Expands resolved zones into ordered record lists and derives PTR records
 * for the declared reverse networks. The result is a deeply frozen
 * `ZoneModel`; any conflict aborts the whole transformation with a
 * `TransformError`.
 */
import { resolveReverse, resolveZone } from "./defaults";
import { isDebug } from "./env";
import { TransformError } from "./errors";
import {
  networkContains,
  networksOverlap,
  reversePointerName,
  reverseZoneName,
} from "./ip";
import { formatEmail } from "./validation";
import type {
  AddressRecord,
  CnameRecord,
  DnsRecord,
  ForwardZone,
  HostEntry,
  IpAddress,
  MxRecord,
  NsRecord,
  ResolvedSoa,
  ResolvedZone,
  ReverseZone,
  SoaRecord,
  SrvRecord,
  ZoneDocument,
  ZoneModel,
} from "@/types/zone";

const DEBUG = isDebug();

/** An address that asked for a PTR record, in forward scan order */
export interface PointerCandidate {
  address: IpAddress;
  target: string;
  ttl: number;
}

interface HostRecords {
  addresses: IpAddress[];
  aliases: string[];
  ttl: number;
  withPtr: boolean;
}

function hostRecords(host: HostEntry, zone: ResolvedZone): HostRecords {
  const { spec } = host;
  switch (spec.kind) {
    case "address":
      return { addresses: [spec.address], aliases: [], ttl: zone.ttl, withPtr: zone.withPtr };
    case "addresses":
      return { addresses: spec.addresses, aliases: [], ttl: zone.ttl, withPtr: zone.withPtr };
    case "entry":
      return {
        addresses: spec.addresses,
        aliases: spec.aliases,
        ttl: spec.ttl ?? zone.ttl,
        withPtr: spec.withPtr ?? zone.withPtr,
      };
  }
}

function addressRecord(name: string, address: IpAddress, ttl: number): AddressRecord {
  return { type: address.version === 4 ? "A" : "AAAA", name, ttl, address };
}

function soaRecord(soa: ResolvedSoa, serial: number): SoaRecord {
  if (soa.retry >= soa.refresh) {
    throw new TransformError(
      `retry (${soa.retry}) must be less than refresh (${soa.refresh})`,
      soa.name,
    );
  }
  return {
    type: "SOA",
    name: soa.name,
    ttl: soa.ttl,
    mname: soa.nameservers[0].name,
    rname: formatEmail(soa.email),
    serial,
    refresh: soa.refresh,
    retry: soa.retry,
    expire: soa.expire,
    minimum: soa.nrcTtl,
  };
}

function nsRecords(soa: ResolvedSoa): NsRecord[] {
  return soa.nameservers.map((ns): NsRecord => ({
    type: "NS",
    name: soa.name,
    ttl: ns.ttl,
    target: ns.name,
  }));
}

/** A CNAME owner may not carry any other record, including another CNAME */
function checkCnameOwners(zone: ResolvedZone, records: DnsRecord[]): void {
  const owners = new Set(records.map((r) => r.name));
  const cnames = new Set<string>();
  for (const cname of zone.cname) {
    if (owners.has(cname.name) || cnames.has(cname.name)) {
      throw new TransformError(
        `CNAME owner '${cname.name}' conflicts with another record of the same name`,
        zone.name,
      );
    }
    cnames.add(cname.name);
  }
}

/**
 * Build the ordered record list of one forward zone: SOA, NS, MX, A/AAAA,
 * CNAME, SRV. Addresses that want a PTR are returned separately.
 */
export function transformZone(
  zone: ResolvedZone,
  serial: number,
): { zone: ForwardZone; pointers: PointerCandidate[] } {
  const soa = soaRecord(zone, serial);
  const records: DnsRecord[] = [soa, ...nsRecords(zone)];

  for (const mx of zone.mx) {
    const record: MxRecord = {
      type: "MX",
      name: zone.name,
      ttl: mx.ttl,
      priority: mx.priority,
      target: mx.name,
    };
    records.push(record);
  }

  const pointers: PointerCandidate[] = [];
  for (const host of zone.hosts) {
    const { addresses, aliases, ttl, withPtr } = hostRecords(host, zone);
    for (const address of addresses) {
      records.push(addressRecord(host.name, address, ttl));
      for (const alias of aliases) records.push(addressRecord(alias, address, ttl));
      if (withPtr && !host.name.startsWith("*")) {
        pointers.push({ address, target: host.name, ttl });
      }
    }
  }

  const srvRecords = zone.srv.map((srv): SrvRecord => ({
    type: "SRV",
    name: srv.name,
    ttl: srv.ttl ?? zone.ttl,
    priority: srv.priority ?? zone.srvPriority,
    weight: srv.weight ?? zone.srvWeight,
    port: srv.port,
    target: srv.target,
  }));

  checkCnameOwners(zone, [...records, ...srvRecords]);
  const cnameRecords = zone.cname.map((cname): CnameRecord => ({
    type: "CNAME",
    name: cname.name,
    ttl: cname.ttl ?? zone.ttl,
    target: cname.target,
  }));

  records.push(...cnameRecords, ...srvRecords);
  return { zone: { name: zone.name, soa, records }, pointers };
}

/** Each address inside a reverse zone may be claimed by one host only */
function checkPointerClaims(pointers: PointerCandidate[], zone: string): void {
  const claimed = new Map<string, string>();
  for (const ptr of pointers) {
    const owner = claimed.get(ptr.address.text);
    if (owner !== undefined) {
      throw new TransformError(
        `address ${ptr.address.text} is claimed for a PTR record by both ${owner} and ${ptr.target}`,
        zone,
      );
    }
    claimed.set(ptr.address.text, ptr.target);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Transform a validated document into the immutable zone model. Reverse
 * zones pick up, in forward scan order, every PTR candidate inside their
 * network; candidates outside all networks are dropped.
 */
export function transformDocument(document: ZoneDocument, serial: number): ZoneModel {
  const zones: ForwardZone[] = [];
  const pointers: PointerCandidate[] = [];
  for (const config of document.zones) {
    const result = transformZone(resolveZone(config, document.defaults), serial);
    zones.push(result.zone);
    pointers.push(...result.pointers);
    if (DEBUG) {
      console.debug("Transformed zone", {
        zone: result.zone.name,
        records: result.zone.records.length,
      });
    }
  }

  const reverse: ReverseZone[] = [];
  const networks = document.reverse.map((r) => r.network);
  for (const [i, config] of document.reverse.entries()) {
    const other = networks.slice(0, i).find((n) => networksOverlap(n, config.network));
    if (other) {
      throw new TransformError(
        `reverse networks overlap: ${config.network.cidr} and ${other.cidr}`,
      );
    }

    const name = reverseZoneName(config.network);
    const sharing = reverse.find((zone) => zone.name === name);
    if (sharing) {
      throw new TransformError(
        `reverse networks ${config.network.cidr} and ${sharing.network.cidr} both map to zone ${name}`,
      );
    }
    const resolved = resolveReverse(config, document.defaults, name);
    const soa = soaRecord(resolved, serial);
    const records: DnsRecord[] = [soa, ...nsRecords(resolved)];
    const inside = pointers.filter((ptr) => networkContains(config.network, ptr.address));
    checkPointerClaims(inside, name);
    for (const ptr of inside) {
      records.push({
        type: "PTR",
        name: reversePointerName(ptr.address),
        ttl: ptr.ttl,
        target: ptr.target,
        address: ptr.address,
      });
    }
    reverse.push({ name, network: config.network, soa, records });
    if (DEBUG) {
      console.debug("Derived reverse zone", {
        zone: name,
        ptr: inside.length,
      });
    }
  }

  return deepFreeze({ serial, zones, reverse });
}
