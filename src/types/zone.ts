/**
 * Shapes shared by the zone pipeline: the position-annotated tree produced
 * by the decoders, the typed configuration produced by the validator, and
 * the immutable record model handed to the renderers.
 */

export const INPUT_FORMATS = ["yaml", "toml"] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export const OUTPUT_FORMATS = ["unbound", "nsd"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** 1-indexed line and column of a node in the source document */
export interface SourcePosition {
  line: number;
  column: number;
}

interface RawNodeBase {
  /** Location expression from the document root, e.g. `zone.example.com.ttl` */
  path: string;
  position: SourcePosition;
}

export type RawScalarValue = string | number | boolean | null;

export interface RawScalar extends RawNodeBase {
  kind: "scalar";
  value: RawScalarValue;
}

export interface RawSequence extends RawNodeBase {
  kind: "sequence";
  items: RawNode[];
}

export interface RawEntry {
  key: string;
  keyPosition: SourcePosition;
  value: RawNode;
}

export interface RawMapping extends RawNodeBase {
  kind: "mapping";
  /** Entries in document order */
  entries: RawEntry[];
}

export type RawNode = RawScalar | RawSequence | RawMapping;

export interface IpAddress {
  version: 4 | 6;
  /** 4 or 16 bytes, network order */
  bytes: number[];
  /** Canonical text form (dotted quad or RFC 5952) */
  text: string;
}

export interface IpNetwork {
  version: 4 | 6;
  /** Network address with host bits cleared */
  bytes: number[];
  prefix: number;
  /** Canonical `address/prefix` text */
  cidr: string;
}

export interface NameserverEntry {
  name: string;
  ttl?: number;
}

export interface MxEntry {
  name: string;
  priority?: number;
  ttl?: number;
}

/**
 * The three legal notations of a host value, resolved structurally when the
 * host node is read.
 */
export type HostSpec =
  | { kind: "address"; address: IpAddress }
  | { kind: "addresses"; addresses: IpAddress[] }
  | {
      kind: "entry";
      addresses: IpAddress[];
      aliases: string[];
      ttl?: number;
      withPtr?: boolean;
    };

export interface HostEntry {
  /** Fully qualified owner name */
  name: string;
  spec: HostSpec;
}

export interface CnameEntry {
  name: string;
  target: string;
  ttl?: number;
}

export interface SrvEntry {
  /** Fully qualified owner, e.g. `_http._tcp.example.com.` */
  name: string;
  service: string;
  protocol: string;
  target: string;
  port: number;
  priority?: number;
  weight?: number;
  ttl?: number;
}

/** SOA timing fields every level of the configuration may override */
export interface SoaOverrides {
  email?: string;
  nameserver?: NameserverEntry[];
  ttl?: number;
  refresh?: number;
  retry?: number;
  expire?: number;
  nrcTtl?: number;
}

export interface Defaults extends SoaOverrides {
  mx?: MxEntry[];
  mxPriority?: number;
  srvPriority?: number;
  srvWeight?: number;
  withPtr?: boolean;
}

export interface ZoneConfig extends SoaOverrides {
  name: string;
  mx?: MxEntry[];
  mxPriority?: number;
  srvPriority?: number;
  srvWeight?: number;
  withPtr?: boolean;
  hosts: HostEntry[];
  cname: CnameEntry[];
  srv: SrvEntry[];
}

export interface ReverseNetworkConfig extends SoaOverrides {
  network: IpNetwork;
}

export interface ZoneDocument {
  defaults: Defaults;
  zones: ZoneConfig[];
  reverse: ReverseNetworkConfig[];
}

export interface ResolvedSoa {
  name: string;
  email: string;
  nameservers: Required<NameserverEntry>[];
  ttl: number;
  refresh: number;
  retry: number;
  expire: number;
  nrcTtl: number;
}

export interface ResolvedZone extends ResolvedSoa {
  mx: Required<MxEntry>[];
  srvPriority: number;
  srvWeight: number;
  withPtr: boolean;
  hosts: HostEntry[];
  cname: CnameEntry[];
  srv: SrvEntry[];
}

export interface ResolvedReverseNetwork extends ResolvedSoa {
  network: IpNetwork;
}

interface RecordBase {
  name: string;
  ttl: number;
}

export interface SoaRecord extends RecordBase {
  type: "SOA";
  mname: string;
  rname: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
}

export interface NsRecord extends RecordBase {
  type: "NS";
  target: string;
}

export interface MxRecord extends RecordBase {
  type: "MX";
  priority: number;
  target: string;
}

export interface AddressRecord extends RecordBase {
  type: "A" | "AAAA";
  address: IpAddress;
}

export interface CnameRecord extends RecordBase {
  type: "CNAME";
  target: string;
}

export interface SrvRecord extends RecordBase {
  type: "SRV";
  priority: number;
  weight: number;
  port: number;
  target: string;
}

export interface PtrRecord extends RecordBase {
  type: "PTR";
  target: string;
  address: IpAddress;
}

export type DnsRecord =
  | SoaRecord
  | NsRecord
  | MxRecord
  | AddressRecord
  | CnameRecord
  | SrvRecord
  | PtrRecord;

export type RecordType = DnsRecord["type"];

export interface ForwardZone {
  readonly name: string;
  readonly soa: Readonly<SoaRecord>;
  /** SOA, NS, MX, A/AAAA, CNAME, SRV in that order */
  readonly records: readonly Readonly<DnsRecord>[];
}

export interface ReverseZone {
  readonly name: string;
  readonly network: Readonly<IpNetwork>;
  readonly soa: Readonly<SoaRecord>;
  /** SOA, NS, then PTR records in forward scan order */
  readonly records: readonly Readonly<DnsRecord>[];
}

export interface ZoneModel {
  readonly serial: number;
  readonly zones: readonly ForwardZone[];
  readonly reverse: readonly ReverseZone[];
}
