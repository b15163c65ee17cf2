import type {
  Defaults,
  ResolvedReverseNetwork,
  ResolvedSoa,
  ResolvedZone,
  ReverseNetworkConfig,
  SoaOverrides,
  ZoneConfig,
} from "@/types/zone";

/** Values used when neither the zone nor `defaults` sets a field */
export const BUILTIN_DEFAULTS = {
  ttl: 86400,
  refresh: 7200,
  retry: 3600,
  expire: 1209600,
  nrcTtl: 3600,
  mxPriority: 10,
  srvPriority: 0,
  srvWeight: 0,
  withPtr: true,
} as const;

/**
 * SOA fields shared by forward and reverse zones. Email and nameservers are
 * guaranteed by validation; a missing value here means the caller skipped it.
 */
function resolveSoa(name: string, own: SoaOverrides, defaults: Defaults): ResolvedSoa {
  const email = own.email ?? defaults.email;
  const nameservers = own.nameserver ?? defaults.nameserver;
  if (email === undefined || nameservers === undefined) {
    throw new Error(`resolveSoa: ${name} was not validated (email or nameserver missing)`);
  }
  const ttl = own.ttl ?? defaults.ttl ?? BUILTIN_DEFAULTS.ttl;
  return {
    name,
    email,
    nameservers: nameservers.map((ns) => ({ name: ns.name, ttl: ns.ttl ?? ttl })),
    ttl,
    refresh: own.refresh ?? defaults.refresh ?? BUILTIN_DEFAULTS.refresh,
    retry: own.retry ?? defaults.retry ?? BUILTIN_DEFAULTS.retry,
    expire: own.expire ?? defaults.expire ?? BUILTIN_DEFAULTS.expire,
    nrcTtl: own.nrcTtl ?? defaults.nrcTtl ?? BUILTIN_DEFAULTS.nrcTtl,
  };
}

/**
 * Merge `defaults` into one zone, field by field. The zone's own value wins;
 * MX entries without a priority or TTL take the zone's effective ones.
 */
export function resolveZone(zone: ZoneConfig, defaults: Defaults): ResolvedZone {
  const soa = resolveSoa(zone.name, zone, defaults);
  const mxPriority = zone.mxPriority ?? defaults.mxPriority ?? BUILTIN_DEFAULTS.mxPriority;
  return {
    ...soa,
    mx: (zone.mx ?? defaults.mx ?? []).map((mx) => ({
      name: mx.name,
      priority: mx.priority ?? mxPriority,
      ttl: mx.ttl ?? soa.ttl,
    })),
    srvPriority: zone.srvPriority ?? defaults.srvPriority ?? BUILTIN_DEFAULTS.srvPriority,
    srvWeight: zone.srvWeight ?? defaults.srvWeight ?? BUILTIN_DEFAULTS.srvWeight,
    withPtr: zone.withPtr ?? defaults.withPtr ?? BUILTIN_DEFAULTS.withPtr,
    hosts: zone.hosts,
    cname: zone.cname,
    srv: zone.srv,
  };
}

export function resolveReverse(
  reverse: ReverseNetworkConfig,
  defaults: Defaults,
  zoneName: string,
): ResolvedReverseNetwork {
  return { ...resolveSoa(zoneName, reverse, defaults), network: reverse.network };
}
