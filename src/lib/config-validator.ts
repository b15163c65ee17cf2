/**
 * Field validator: walks the decoded tree and builds the typed zone
 * configuration. Every scalar goes through a zod schema from `validation.ts`;
 * failures are recorded with the node's path and position and the walk
 * carries on, so one run reports every bad field in the document.
 */
import type { ZodType, ZodTypeDef } from "zod";
import type { ValidationIssue } from "./errors";
import { reverseZoneName } from "./ip";
import { describeNode, emptyMapping } from "./raw-node";
import {
  booleanSchema,
  emailSchema,
  hostNameSchema,
  ipAddressSchema,
  reverseNetworkSchema,
  srvKeySchema,
  timeValueSchema,
  ttlSchema,
  uint16Schema,
  zoneNameSchema,
} from "./validation";
import type {
  CnameEntry,
  Defaults,
  HostEntry,
  HostSpec,
  MxEntry,
  NameserverEntry,
  RawEntry,
  RawMapping,
  RawNode,
  ReverseNetworkConfig,
  SoaOverrides,
  SourcePosition,
  SrvEntry,
  ZoneConfig,
  ZoneDocument,
} from "@/types/zone";

const SOA_FIELDS = ["email", "nameserver", "ttl", "refresh", "retry", "expire", "nrc-ttl"];
const RECORD_DEFAULT_FIELDS = ["mx", "mx-prio", "srv-prio", "srv-weight", "with-ptr"];
const ROOT_FIELDS = ["defaults", "zone", "reverse"];
const DEFAULTS_FIELDS = [...SOA_FIELDS, ...RECORD_DEFAULT_FIELDS];
const ZONE_FIELDS = [...SOA_FIELDS, ...RECORD_DEFAULT_FIELDS, "hosts", "cname", "srv"];
const NAMESERVER_FIELDS = ["name", "ttl"];
const MX_FIELDS = ["name", "prio", "ttl"];
const HOST_FIELDS = ["ip", "alias", "ttl", "with-ptr"];
const CNAME_FIELDS = ["target", "ttl"];
const CNAME_LIST_FIELDS = ["name", "target", "ttl"];
const SRV_FIELDS = ["target", "port", "prio", "weight", "ttl"];

/** Stand-in origin used to keep checking a zone whose own name is invalid */
const UNKNOWN_ORIGIN = "invalid.";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;
type Fields = Map<string, RawNode>;

interface Located {
  path: string;
  position?: SourcePosition;
}

export type ValidationResult =
  | { ok: true; document: ZoneDocument }
  | { ok: false; issues: ValidationIssue[] };

/**
 * Collects issues while reading nodes. Every read returns `undefined` after
 * recording why the node was rejected.
 */
class FieldReader {
  readonly issues: ValidationIssue[] = [];

  report(at: Located, message: string): void {
    this.issues.push({ path: at.path, position: at.position, message });
  }

  /** Marker for `failedSince` */
  mark(): number {
    return this.issues.length;
  }

  failedSince(mark: number): boolean {
    return this.issues.length > mark;
  }

  value<T>(node: RawNode, schema: Schema<T>, expected: string): T | undefined {
    if (node.kind !== "scalar") {
      this.report(node, `expected ${expected}, got ${describeNode(node)}`);
      return undefined;
    }
    return this.check(node, node.value, schema);
  }

  /** Validate a mapping key; issues point at the key with the entry's path */
  key<T>(entry: RawEntry, schema: Schema<T>): T | undefined {
    return this.check(
      { path: entry.value.path, position: entry.keyPosition },
      entry.key,
      schema,
    );
  }

  /** Run `value` through `schema`, reporting every zod issue at `at` */
  check<T>(at: Located, value: unknown, schema: Schema<T>): T | undefined {
    const result = schema.safeParse(value);
    if (result.success) return result.data;
    for (const issue of result.error.issues) this.report(at, issue.message);
    return undefined;
  }

  mapping(node: RawNode, expected: string): RawMapping | undefined {
    if (node.kind === "mapping") return node;
    if (node.kind === "scalar" && node.value === null) {
      return emptyMapping(node.path, node.position);
    }
    this.report(node, `expected ${expected}, got ${describeNode(node)}`);
    return undefined;
  }

  /** Single value or sequence of values */
  oneOrMany<T>(node: RawNode, read: (item: RawNode) => T | undefined): T[] {
    const items = node.kind === "sequence" ? node.items : [node];
    const out: T[] = [];
    for (const item of items) {
      const val = read(item);
      if (val !== undefined) out.push(val);
    }
    return out;
  }

  fields(mapping: RawMapping, allowed: readonly string[]): Fields {
    const fields: Fields = new Map();
    for (const entry of mapping.entries) {
      if (!allowed.includes(entry.key)) {
        this.report(
          { path: entry.value.path, position: entry.keyPosition },
          `unknown field '${entry.key}', expected one of ${allowed.map((k) => `'${k}'`).join(", ")}`,
        );
        continue;
      }
      fields.set(entry.key, entry.value);
    }
    return fields;
  }

  optional<T>(
    fields: Fields,
    key: string,
    read: (node: RawNode) => T | undefined,
  ): T | undefined {
    const node = fields.get(key);
    return node === undefined ? undefined : read(node);
  }

  required<T>(
    owner: RawMapping,
    fields: Fields,
    key: string,
    read: (node: RawNode) => T | undefined,
  ): T | undefined {
    const node = fields.get(key);
    if (node === undefined) {
      this.report(owner, `missing field '${key}'`);
      return undefined;
    }
    return read(node);
  }
}

function readTime(r: FieldReader, fields: Fields, key: string, label: string) {
  const schema = label === "TTL" ? ttlSchema : timeValueSchema(label);
  return r.optional(fields, key, (n) => r.value(n, schema, `a ${label} in seconds`));
}

function readNameserver(
  r: FieldReader,
  node: RawNode,
  origin?: string,
): NameserverEntry | undefined {
  if (node.kind !== "mapping") {
    const name = r.value(node, hostNameSchema(origin), "a nameserver name");
    return name === undefined ? undefined : { name };
  }
  const mark = r.mark();
  const fields = r.fields(node, NAMESERVER_FIELDS);
  const name = r.required(node, fields, "name", (n) =>
    r.value(n, hostNameSchema(origin), "a nameserver name"),
  );
  const ttl = readTime(r, fields, "ttl", "TTL");
  if (name === undefined || r.failedSince(mark)) return undefined;
  return { name, ttl };
}

function readMx(r: FieldReader, node: RawNode, origin?: string): MxEntry | undefined {
  if (node.kind !== "mapping") {
    const name = r.value(node, hostNameSchema(origin), "a mail exchanger name");
    return name === undefined ? undefined : { name };
  }
  const mark = r.mark();
  const fields = r.fields(node, MX_FIELDS);
  const name = r.required(node, fields, "name", (n) =>
    r.value(n, hostNameSchema(origin), "a mail exchanger name"),
  );
  const priority = r.optional(fields, "prio", (n) =>
    r.value(n, uint16Schema("MX priority"), "an MX priority"),
  );
  const ttl = readTime(r, fields, "ttl", "TTL");
  if (name === undefined || r.failedSince(mark)) return undefined;
  return { name, priority, ttl };
}

/**
 * SOA-related overrides shared by defaults, zones and reverse networks,
 * including the retry/refresh cross-check on this level.
 */
function readSoa(r: FieldReader, fields: Fields, origin?: string): SoaOverrides {
  const soa: SoaOverrides = {
    email: r.optional(fields, "email", (n) => r.value(n, emailSchema, "an email address")),
    nameserver: r.optional(fields, "nameserver", (n) => {
      if (n.kind === "sequence" && n.items.length === 0) {
        r.report(n, "nameserver list cannot be empty");
      }
      return r.oneOrMany(n, (item) => readNameserver(r, item, origin));
    }),
    ttl: readTime(r, fields, "ttl", "TTL"),
    refresh: readTime(r, fields, "refresh", "Refresh"),
    retry: readTime(r, fields, "retry", "Retry"),
    expire: readTime(r, fields, "expire", "Expire"),
    nrcTtl: readTime(r, fields, "nrc-ttl", "Negative cache TTL"),
  };
  const retryNode = fields.get("retry");
  if (
    retryNode &&
    soa.retry !== undefined &&
    soa.refresh !== undefined &&
    soa.retry >= soa.refresh
  ) {
    r.report(retryNode, `retry (${soa.retry}) must be less than refresh (${soa.refresh})`);
  }
  return soa;
}

interface RecordDefaults {
  mx?: MxEntry[];
  mxPriority?: number;
  srvPriority?: number;
  srvWeight?: number;
  withPtr?: boolean;
}

function readRecordDefaults(
  r: FieldReader,
  fields: Fields,
  origin?: string,
): RecordDefaults {
  return {
    mx: r.optional(fields, "mx", (n) => r.oneOrMany(n, (item) => readMx(r, item, origin))),
    mxPriority: r.optional(fields, "mx-prio", (n) =>
      r.value(n, uint16Schema("MX priority"), "an MX priority"),
    ),
    srvPriority: r.optional(fields, "srv-prio", (n) =>
      r.value(n, uint16Schema("SRV priority"), "an SRV priority"),
    ),
    srvWeight: r.optional(fields, "srv-weight", (n) =>
      r.value(n, uint16Schema("SRV weight"), "an SRV weight"),
    ),
    withPtr: r.optional(fields, "with-ptr", (n) => r.value(n, booleanSchema, "a boolean")),
  };
}

function readDefaults(
  r: FieldReader,
  node: RawNode | undefined,
): { defaults: Defaults; present: Set<string> } {
  const mapping = node ? r.mapping(node, "a defaults mapping") : undefined;
  if (!mapping) return { defaults: {}, present: new Set<string>() };
  const fields = r.fields(mapping, DEFAULTS_FIELDS);
  const defaults: Defaults = {
    ...readSoa(r, fields),
    ...readRecordDefaults(r, fields),
  };
  return { defaults, present: new Set(fields.keys()) };
}

function readAddresses(r: FieldReader, node: RawNode) {
  if (node.kind === "sequence" && node.items.length === 0) {
    r.report(node, "a host needs at least one IP address");
  }
  const seen = new Set<string>();
  return r.oneOrMany(node, (item) => {
    const address = r.value(item, ipAddressSchema, "an IP address");
    if (address === undefined) return undefined;
    if (seen.has(address.text)) {
      r.report(item, `duplicate address '${address.text}'`);
      return undefined;
    }
    seen.add(address.text);
    return address;
  });
}

/**
 * A host value is a single address, a list of addresses, or a mapping with
 * `ip` and optional `alias`, `ttl`, `with-ptr`.
 */
function readHostSpec(r: FieldReader, node: RawNode, origin: string): HostSpec | undefined {
  if (node.kind === "scalar") {
    if (node.value === null) {
      r.report(node, "expected an IP address, a list of IP addresses or a mapping with 'ip', got nothing");
      return undefined;
    }
    const address = r.value(node, ipAddressSchema, "an IP address");
    if (!address) return undefined;
    return { kind: "address", address };
  }
  if (node.kind === "sequence") {
    return { kind: "addresses", addresses: readAddresses(r, node) };
  }
  const fields = r.fields(node, HOST_FIELDS);
  return {
    kind: "entry",
    addresses: r.required(node, fields, "ip", (n) => readAddresses(r, n)) ?? [],
    aliases:
      r.optional(fields, "alias", (n) =>
        r.oneOrMany(n, (item) => r.value(item, hostNameSchema(origin), "an alias name")),
      ) ?? [],
    ttl: readTime(r, fields, "ttl", "TTL"),
    withPtr: r.optional(fields, "with-ptr", (n) => r.value(n, booleanSchema, "a boolean")),
  };
}

function readHosts(r: FieldReader, node: RawNode, origin: string): HostEntry[] {
  const mapping = r.mapping(node, "a mapping of host names");
  if (!mapping) return [];
  const hosts: HostEntry[] = [];
  const seen = new Set<string>();
  for (const entry of mapping.entries) {
    const mark = r.mark();
    const name = r.key(entry, hostNameSchema(origin));
    const spec = readHostSpec(r, entry.value, origin);
    if (name !== undefined && seen.has(name)) {
      r.report({ path: entry.value.path, position: entry.keyPosition }, `duplicate host '${name}'`);
    }
    if (name === undefined || spec === undefined || r.failedSince(mark)) continue;
    seen.add(name);
    hosts.push({ name, spec });
  }
  return hosts;
}

function readCnameBody(
  r: FieldReader,
  node: RawNode,
  origin: string,
): Omit<CnameEntry, "name"> | undefined {
  if (node.kind !== "mapping") {
    const target = r.value(node, hostNameSchema(origin), "a CNAME target");
    return target === undefined ? undefined : { target };
  }
  const mark = r.mark();
  const fields = r.fields(node, CNAME_FIELDS);
  const target = r.required(node, fields, "target", (n) =>
    r.value(n, hostNameSchema(origin), "a CNAME target"),
  );
  const ttl = readTime(r, fields, "ttl", "TTL");
  if (target === undefined || r.failedSince(mark)) return undefined;
  return { target, ttl };
}

/**
 * CNAMEs come as a mapping `alias: target | {target, ttl}` or as an ordered
 * list of `{name, target, ttl}`.
 */
function readCnames(r: FieldReader, node: RawNode, origin: string): CnameEntry[] {
  const cnames: CnameEntry[] = [];
  if (node.kind === "sequence") {
    for (const item of node.items) {
      const mapping = r.mapping(item, "a mapping with 'name' and 'target'");
      if (!mapping) continue;
      const mark = r.mark();
      const fields = r.fields(mapping, CNAME_LIST_FIELDS);
      const name = r.required(mapping, fields, "name", (n) =>
        r.value(n, hostNameSchema(origin), "an alias name"),
      );
      const target = r.required(mapping, fields, "target", (n) =>
        r.value(n, hostNameSchema(origin), "a CNAME target"),
      );
      const ttl = readTime(r, fields, "ttl", "TTL");
      if (name === undefined || target === undefined || r.failedSince(mark)) continue;
      cnames.push({ name, target, ttl });
    }
    return cnames;
  }
  const mapping = r.mapping(node, "a mapping of aliases or a list of CNAME entries");
  if (!mapping) return cnames;
  for (const entry of mapping.entries) {
    const name = r.key(entry, hostNameSchema(origin));
    const body = readCnameBody(r, entry.value, origin);
    if (name !== undefined && body !== undefined) cnames.push({ name, ...body });
  }
  return cnames;
}

function readSrvs(r: FieldReader, node: RawNode, origin: string): SrvEntry[] {
  const mapping = r.mapping(node, "a mapping of '_service._protocol' keys");
  if (!mapping) return [];
  const srvs: SrvEntry[] = [];
  for (const entry of mapping.entries) {
    const mark = r.mark();
    const key = r.key(entry, srvKeySchema);
    const name = key === undefined ? undefined : r.key(entry, hostNameSchema(origin));
    const body = r.mapping(entry.value, "an SRV mapping with 'target' and 'port'");
    if (!body) continue;
    const fields = r.fields(body, SRV_FIELDS);
    const target = r.required(body, fields, "target", (n) =>
      r.value(n, hostNameSchema(origin), "an SRV target"),
    );
    const port = r.required(body, fields, "port", (n) =>
      r.value(n, uint16Schema("SRV port"), "a port number"),
    );
    const priority = r.optional(fields, "prio", (n) =>
      r.value(n, uint16Schema("SRV priority"), "an SRV priority"),
    );
    const weight = r.optional(fields, "weight", (n) =>
      r.value(n, uint16Schema("SRV weight"), "an SRV weight"),
    );
    const ttl = readTime(r, fields, "ttl", "TTL");
    if (
      key === undefined ||
      name === undefined ||
      target === undefined ||
      port === undefined ||
      r.failedSince(mark)
    ) {
      continue;
    }
    const [service, protocol] = key.split(".");
    srvs.push({ name, service, protocol, target, port, priority, weight, ttl });
  }
  return srvs;
}

/** Email and nameserver must come from the entry itself or from defaults */
function requireSoaSources(
  r: FieldReader,
  at: RawMapping,
  fields: Fields,
  present: Set<string>,
  what: string,
): void {
  if (!fields.has("email") && !present.has("email")) {
    r.report(at, `Email is required for ${what} (set 'email' here or in defaults)`);
  }
  if (!fields.has("nameserver") && !present.has("nameserver")) {
    r.report(at, `${what} needs a nameserver (set 'nameserver' here or in defaults)`);
  }
}

function readZone(
  r: FieldReader,
  entry: RawEntry,
  present: Set<string>,
): ZoneConfig | undefined {
  const mark = r.mark();
  const name = r.key(entry, zoneNameSchema);
  const origin = name ?? UNKNOWN_ORIGIN;
  const body = r.mapping(entry.value, "a zone mapping");
  if (!body) return undefined;
  const fields = r.fields(body, ZONE_FIELDS);
  requireSoaSources(r, body, fields, present, `zone ${name ?? entry.key}`);

  const zone: ZoneConfig = {
    name: origin,
    ...readSoa(r, fields, origin),
    ...readRecordDefaults(r, fields, origin),
    hosts: r.optional(fields, "hosts", (n) => readHosts(r, n, origin)) ?? [],
    cname: r.optional(fields, "cname", (n) => readCnames(r, n, origin)) ?? [],
    srv: r.optional(fields, "srv", (n) => readSrvs(r, n, origin)) ?? [],
  };
  return r.failedSince(mark) ? undefined : zone;
}

function readReverse(
  r: FieldReader,
  entry: RawEntry,
  present: Set<string>,
): ReverseNetworkConfig | undefined {
  const mark = r.mark();
  const network = r.key(entry, reverseNetworkSchema);
  const body = r.mapping(entry.value, "a reverse zone mapping");
  if (!body) return undefined;
  const fields = r.fields(body, SOA_FIELDS);
  requireSoaSources(r, body, fields, present, `reverse zone ${entry.key}`);
  const soa = readSoa(r, fields, network && reverseZoneName(network));
  if (network === undefined || r.failedSince(mark)) return undefined;
  return { network, ...soa };
}

/**
 * Validate a decoded document. Returns the typed configuration, or every
 * issue found anywhere in the document.
 */
export function validateDocument(root: RawMapping): ValidationResult {
  const r = new FieldReader();
  const fields = r.fields(root, ROOT_FIELDS);
  const { defaults, present } = readDefaults(r, fields.get("defaults"));

  const zones: ZoneConfig[] = [];
  const zoneNode = fields.get("zone");
  const zoneMap = zoneNode && r.mapping(zoneNode, "a mapping or list of zones");
  const seen = new Set<string>();
  for (const entry of zoneMap?.entries ?? []) {
    const zone = readZone(r, entry, present);
    if (!zone) continue;
    if (seen.has(zone.name)) {
      r.report({ path: entry.value.path, position: entry.keyPosition }, `duplicate zone '${zone.name}'`);
      continue;
    }
    seen.add(zone.name);
    zones.push(zone);
  }

  const reverse: ReverseNetworkConfig[] = [];
  const reverseNode = fields.get("reverse");
  const reverseMap = reverseNode && r.mapping(reverseNode, "a network, a list of networks or a mapping of networks");
  for (const entry of reverseMap?.entries ?? []) {
    const network = readReverse(r, entry, present);
    if (network) reverse.push(network);
  }

  if (r.issues.length > 0) return { ok: false, issues: r.issues };
  return { ok: true, document: { defaults, zones, reverse } };
}
