import assert from "node:assert/strict";
import { test } from "node:test";
import { BUILTIN_DEFAULTS, resolveReverse, resolveZone } from "../src/lib/defaults";
import { parseIpNetwork } from "../src/lib/ip";
import type { Defaults, ZoneConfig } from "../src/types/zone";

const defaults: Defaults = {
  email: "hostmaster@example.com",
  nameserver: [{ name: "ns1.example.com." }, { name: "ns2.example.com.", ttl: 600 }],
  mxPriority: 20,
  mx: [{ name: "mail.example.com." }, { name: "mx2.example.com.", priority: 5, ttl: 60 }],
};

function zone(overrides: Partial<ZoneConfig> = {}): ZoneConfig {
  return { name: "example.com.", hosts: [], cname: [], srv: [], ...overrides };
}

test("built-in values fill every field not set anywhere", () => {
  const resolved = resolveZone(zone(), defaults);
  assert.deepEqual(
    {
      ttl: resolved.ttl,
      refresh: resolved.refresh,
      retry: resolved.retry,
      expire: resolved.expire,
      nrcTtl: resolved.nrcTtl,
      srvPriority: resolved.srvPriority,
      srvWeight: resolved.srvWeight,
      withPtr: resolved.withPtr,
    },
    {
      ttl: 86400,
      refresh: 7200,
      retry: 3600,
      expire: 1209600,
      nrcTtl: 3600,
      srvPriority: 0,
      srvWeight: 0,
      withPtr: true,
    },
  );
  assert.equal(BUILTIN_DEFAULTS.mxPriority, 10);
});

test("defaults apply where the zone is silent", () => {
  const resolved = resolveZone(zone({ ttl: 3600 }), defaults);
  assert.equal(resolved.email, "hostmaster@example.com");
  assert.deepEqual(resolved.nameservers, [
    { name: "ns1.example.com.", ttl: 3600 },
    { name: "ns2.example.com.", ttl: 600 },
  ]);
  assert.deepEqual(resolved.mx, [
    { name: "mail.example.com.", priority: 20, ttl: 3600 },
    { name: "mx2.example.com.", priority: 5, ttl: 60 },
  ]);
});

test("zone values win over defaults", () => {
  const resolved = resolveZone(
    zone({
      email: "dns@example.com",
      nameserver: [{ name: "ns.example.com." }],
      mx: [{ name: "mx.example.com." }],
      mxPriority: 30,
      retry: 900,
      withPtr: false,
    }),
    { ...defaults, retry: 1800, withPtr: true },
  );
  assert.equal(resolved.email, "dns@example.com");
  assert.deepEqual(resolved.nameservers, [{ name: "ns.example.com.", ttl: 86400 }]);
  assert.deepEqual(resolved.mx, [{ name: "mx.example.com.", priority: 30, ttl: 86400 }]);
  assert.equal(resolved.retry, 900);
  assert.equal(resolved.withPtr, false);
});

test("a zone without MX anywhere has none", () => {
  const resolved = resolveZone(zone(), { email: defaults.email, nameserver: defaults.nameserver });
  assert.deepEqual(resolved.mx, []);
});

test("reverse networks resolve from their own overrides and defaults", () => {
  const parsed = parseIpNetwork("192.168.1.0/24");
  assert.ok(parsed.ok);
  const resolved = resolveReverse(
    { network: parsed.network, ttl: 600 },
    defaults,
    "1.168.192.in-addr.arpa.",
  );
  assert.equal(resolved.name, "1.168.192.in-addr.arpa.");
  assert.equal(resolved.ttl, 600);
  assert.equal(resolved.refresh, 7200);
  assert.equal(resolved.network.cidr, "192.168.1.0/24");
  assert.deepEqual(resolved.nameservers[0], { name: "ns1.example.com.", ttl: 600 });
});

test("resolving an unvalidated zone without email throws", () => {
  assert.throws(() => resolveZone(zone(), {}), /email or nameserver missing/);
});
