import { compareAddresses } from "../ip";
import type { DnsRecord, PtrRecord } from "@/types/zone";

/** Presentation-format RDATA of a record */
export function recordData(record: DnsRecord): string {
  switch (record.type) {
    case "SOA":
      return [
        record.mname,
        record.rname,
        record.serial,
        record.refresh,
        record.retry,
        record.expire,
        record.minimum,
      ].join(" ");
    case "NS":
    case "CNAME":
    case "PTR":
      return record.target;
    case "MX":
      return `${record.priority} ${record.target}`;
    case "A":
    case "AAAA":
      return record.address.text;
    case "SRV":
      return `${record.priority} ${record.weight} ${record.port} ${record.target}`;
  }
}

/**
 * Owner name relative to `origin`: `@` for the apex, the leading labels for
 * names below it, the absolute name otherwise.
 */
export function relativeName(name: string, origin: string): string {
  if (name === origin) return "@";
  const suffix = `.${origin}`;
  return name.endsWith(suffix) ? name.slice(0, -suffix.length) : name;
}

/** PTR records of a reverse zone, ordered by address */
export function sortedPointers(records: readonly DnsRecord[]): PtrRecord[] {
  const pointers: PtrRecord[] = [];
  for (const record of records) {
    if (record.type === "PTR") pointers.push(record);
  }
  return pointers.sort((a, b) => compareAddresses(a.address, b.address));
}
