import assert from "node:assert/strict";
import { test } from "node:test";
import type { ZodType, ZodTypeDef } from "zod";
import {
  formatEmail,
  hostNameSchema,
  ipAddressSchema,
  qualifyName,
  reverseNetworkSchema,
  timeValueSchema,
  ttlSchema,
  uint16Schema,
  validateDnsName,
  validateEmail,
  validateSrvKey,
} from "../src/lib/validation";

function messageOf<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): string {
  const result = schema.safeParse(value);
  assert.equal(result.success, false);
  return result.success ? "" : result.error.issues[0].message;
}

test("TTL accepts the full positive 32-bit range", () => {
  for (const ttl of [1, 300, 86400, 2147483647]) {
    assert.equal(ttlSchema.safeParse(ttl).success, true, `ttl ${ttl}`);
  }
});

test("TTL rejects zero, negative and oversized values", () => {
  assert.equal(messageOf(ttlSchema, 0), "TTL cannot be zero");
  assert.equal(messageOf(ttlSchema, -5), "TTL cannot be negative");
  assert.equal(messageOf(ttlSchema, 2147483648), "TTL too large (max 2147483647)");
  assert.equal(messageOf(ttlSchema, 1.5), "TTL must be an integer");
  assert.equal(messageOf(ttlSchema, "3600"), "TTL must be an integer");
});

test("other time values use their own label", () => {
  assert.equal(messageOf(timeValueSchema("Refresh"), 0), "Refresh cannot be zero");
  assert.equal(messageOf(timeValueSchema("Retry"), -1), "Retry cannot be negative");
});

test("16-bit values are range checked", () => {
  assert.equal(uint16Schema("SRV port").safeParse(65535).success, true);
  assert.equal(uint16Schema("SRV port").safeParse(0).success, true);
  assert.equal(
    messageOf(uint16Schema("SRV port"), 70000),
    "SRV port must be an integer between 0 and 65535, got: 70000",
  );
});

test("DNS names enforce length limits", () => {
  const longest = `${"a".repeat(63)}.`.repeat(3) + `${"b".repeat(60)}.`;
  assert.equal(longest.length, 253);
  assert.equal(validateDnsName(longest), undefined);

  const tooLong = `${"a".repeat(63)}.`.repeat(4);
  assert.equal(validateDnsName(tooLong), `DNS name too long (max 253 chars): ${tooLong}`);

  const label = "a".repeat(64);
  assert.equal(
    validateDnsName(`${label}.example.com.`),
    `DNS label too long (max 63 chars): ${label}`,
  );
  assert.equal(validateDnsName("a..b."), "DNS name has empty label: a..b.");
});

test("DNS names reject bad labels", () => {
  assert.equal(validateDnsName("example.com"), "Host must be fully qualified: example.com");
  assert.equal(
    validateDnsName("bad-.example.com."),
    "DNS label cannot start/end with hyphen: bad-",
  );
  assert.equal(
    validateDnsName("sp ace.example.com."),
    "DNS label has invalid characters: sp ace",
  );
  assert.equal(validateDnsName("_dmarc.example.com."), undefined);
});

test("wildcards are only allowed as the whole leftmost label", () => {
  assert.equal(validateDnsName("*.example.com."), undefined);
  assert.equal(
    validateDnsName("www.*.example.com."),
    "Wildcard '*' must be leftmost label, got: www.*.example.com.",
  );
  assert.equal(
    validateDnsName("*foo.example.com."),
    "Wildcard '*' must be entire label, got: *foo",
  );
});

test("email addresses", () => {
  assert.equal(validateEmail("hostmaster@example.com"), undefined);
  assert.equal(validateEmail("john.doe+dns@example.co.uk"), undefined);
  assert.equal(
    validateEmail("admin.example.com"),
    "Email must contain '@', got: admin.example.com",
  );
  assert.equal(
    validateEmail("john..doe@example.com"),
    "Email local part cannot contain consecutive dots: john..doe",
  );
  assert.equal(
    validateEmail("root@localhost"),
    "Email domain must contain at least one dot (e.g., 'example.com'): localhost",
  );
  assert.equal(validateEmail("root@example.123"), "Email domain TLD cannot be all numeric: 123");
  assert.equal(validateEmail("admin@example.com."), undefined);
  assert.equal(
    validateEmail("admin@example.com.."),
    "Email domain cannot have empty labels: example.com.",
  );
});

test("formatEmail produces the SOA mailbox form", () => {
  assert.equal(formatEmail("john.doe@example.com"), "john\\.doe.example.com.");
  assert.equal(formatEmail("admin@example.com."), "admin.example.com.");
});

test("SRV keys name the component missing its underscore", () => {
  assert.equal(validateSrvKey("_http._tcp"), undefined);
  assert.equal(
    validateSrvKey("mqtt.tcp"),
    "SRV service name 'mqtt' must start with '_' (e.g., '_http')",
  );
  assert.equal(
    validateSrvKey("_mqtt.tcp"),
    "SRV protocol name 'tcp' must start with '_' (e.g., '_tcp')",
  );
  assert.equal(
    validateSrvKey("_http"),
    "SRV name must have at least service and protocol (e.g., '_http._tcp'), got: '_http'",
  );
});

test("names are qualified against the zone origin", () => {
  assert.equal(qualifyName("www", "example.com."), "www.example.com.");
  assert.equal(qualifyName("@", "example.com."), "example.com.");
  assert.equal(qualifyName("mail.example.org.", "example.com."), "mail.example.org.");
  assert.equal(qualifyName(" www ", "example.com."), "www.example.com.");
  assert.equal(qualifyName("www"), "www");
});

test("hostNameSchema qualifies then validates", () => {
  const zoneScoped = hostNameSchema("example.com.").safeParse("www");
  assert.equal(zoneScoped.success && zoneScoped.data, "www.example.com.");
  assert.equal(messageOf(hostNameSchema(), "www"), "Host must be fully qualified: www");
  assert.equal(messageOf(hostNameSchema("example.com."), 42), "Host name must be a string");
});

test("ipAddressSchema returns the canonical address", () => {
  const parsed = ipAddressSchema.safeParse("2001:DB8:0::1");
  assert.equal(parsed.success && parsed.data.text, "2001:db8::1");
  assert.equal(messageOf(ipAddressSchema, "192.0.2.300"), "'192.0.2.300' is not a valid IP address");
});

test("reverse networks need a usable prefix", () => {
  const parsed = reverseNetworkSchema.safeParse("192.168.1.7/24");
  assert.equal(parsed.success && parsed.data.cidr, "192.168.1.0/24");
  assert.equal(
    messageOf(reverseNetworkSchema, "10.0.0.0/4"),
    "Prefix /4 is too short for a reverse zone (min /8)",
  );
  assert.equal(
    messageOf(reverseNetworkSchema, "2001:db8::/2"),
    "Prefix /2 is too short for a reverse zone (min /4)",
  );
});
