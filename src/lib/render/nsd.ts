import { recordData, relativeName, sortedPointers } from "./format";
import type { DnsRecord, SoaRecord, ZoneModel } from "@/types/zone";

const NAME_WIDTH = 32;
const TTL_WIDTH = 8;
const TYPE_WIDTH = 5;
const INDENT = " ".repeat(8);

/** Files of an NSD configuration, keyed by path relative to the output dir */
export type NsdFiles = Map<string, string>;

export function zoneFileName(zone: string): string {
  return `master/${zone}zone`;
}

/** One record line; the TTL column stays empty when it equals `$TTL` */
function recordLine(record: DnsRecord, origin: string, zoneTtl: number): string {
  const ttl = record.ttl === zoneTtl ? "" : String(record.ttl);
  return [
    relativeName(record.name, origin).padEnd(NAME_WIDTH),
    ttl.padEnd(TTL_WIDTH),
    "IN",
    record.type.padEnd(TYPE_WIDTH),
    recordData(record),
  ].join(" ");
}

function soaBlock(soa: SoaRecord): string[] {
  return [
    `$ORIGIN ${soa.name}`,
    `$TTL ${soa.ttl}`,
    "",
    `@ IN SOA ${soa.mname} ${soa.rname} (`,
    `${INDENT}${String(soa.serial).padEnd(12)}; serial number`,
    `${INDENT}${String(soa.refresh).padEnd(12)}; refresh`,
    `${INDENT}${String(soa.retry).padEnd(12)}; retry`,
    `${INDENT}${String(soa.expire).padEnd(12)}; expire`,
    `${INDENT}${String(soa.minimum).padEnd(12)}; min ttl`,
    `${INDENT})`,
  ];
}

function zoneFile(
  soa: SoaRecord,
  records: readonly DnsRecord[],
): string {
  const lines = soaBlock(soa);
  for (const record of records) {
    if (record.type !== "SOA") lines.push(recordLine(record, soa.name, soa.ttl));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Render the model as NSD configuration: `zones.conf` listing every zone and
 * one zone file per forward and reverse zone under `master/`.
 */
export function renderNsd(model: ZoneModel): NsdFiles {
  const files: NsdFiles = new Map();
  const conf: string[] = [];
  const addZone = (name: string, content: string) => {
    conf.push("zone:", `    name: ${name}`, `    zonefile: ${zoneFileName(name)}`, "");
    files.set(zoneFileName(name), content);
  };

  for (const zone of model.zones) {
    addZone(zone.name, zoneFile(zone.soa, zone.records));
  }
  for (const zone of model.reverse) {
    const head = zone.records.filter((r) => r.type !== "PTR");
    addZone(zone.name, zoneFile(zone.soa, [...head, ...sortedPointers(zone.records)]));
  }

  files.set("zones.conf", conf.join("\n"));
  return files;
}
