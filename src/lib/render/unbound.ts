import { recordData, sortedPointers } from "./format";
import type { ZoneModel } from "@/types/zone";

const NAME_WIDTH = 40;
const TYPE_WIDTH = 5;

function localData(name: string, ttl: number, type: string, data: string): string {
  return `local-data: "${name.padEnd(NAME_WIDTH)} ${ttl} IN ${type.padEnd(TYPE_WIDTH)} ${data}"`;
}

/**
 * Render the model as one Unbound `server:` clause: a static `local-zone`
 * per zone followed by its records, PTR records as `local-data-ptr`.
 */
export function renderUnbound(model: ZoneModel): string {
  const lines = ["server:"];

  for (const zone of model.zones) {
    lines.push(`local-zone: "${zone.name}" static`);
    for (const record of zone.records) {
      lines.push(localData(record.name, record.ttl, record.type, recordData(record)));
    }
    lines.push("");
  }

  for (const zone of model.reverse) {
    lines.push(`local-zone: "${zone.name}" static`);
    for (const record of zone.records) {
      if (record.type === "PTR") continue;
      lines.push(localData(record.name, record.ttl, record.type, recordData(record)));
    }
    for (const ptr of sortedPointers(zone.records)) {
      lines.push(`local-data-ptr: "${ptr.address.text} ${ptr.ttl} ${ptr.target}"`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
