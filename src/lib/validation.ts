import { z } from "zod";
import { parseIpAddress, parseIpNetwork } from "./ip";

/** Largest TTL-class value (RFC 2181 section 8) */
export const MAX_TIME_VALUE = 2147483647;

/** Smallest prefix a reverse zone can be derived from */
const MIN_REVERSE_PREFIX = { 4: 8, 6: 4 } as const;

/**
 * Check a fully qualified DNS name. Returns the first problem found, or
 * `undefined` when the name is valid.
 *
 * - total length at most 253 characters, trailing dot required
 * - labels 1-63 characters of letters, digits, `-` and `_`
 * - no label starts or ends with a hyphen
 * - `*` only as a whole, leftmost label
 */
export function validateDnsName(name: string): string | undefined {
  if (name.length > 253) return `DNS name too long (max 253 chars): ${name}`;
  if (!name.endsWith(".")) return `Host must be fully qualified: ${name}`;
  const labels = name.slice(0, -1).split(".");
  for (const [i, label] of labels.entries()) {
    if (label.length === 0) return `DNS name has empty label: ${name}`;
    if (label.length > 63) return `DNS label too long (max 63 chars): ${label}`;
    if (label.includes("*")) {
      if (i !== 0) return `Wildcard '*' must be leftmost label, got: ${name}`;
      if (label !== "*") return `Wildcard '*' must be entire label, got: ${label}`;
      continue;
    }
    if (label.startsWith("-") || label.endsWith("-")) {
      return `DNS label cannot start/end with hyphen: ${label}`;
    }
    if (!/^[A-Za-z0-9_-]+$/.test(label)) {
      return `DNS label has invalid characters: ${label}`;
    }
  }
  return undefined;
}

/**
 * Check a mailbox address (`user@example.com`, one trailing dot allowed on
 * the domain). Returns the first problem found, or `undefined` when the
 * address is valid.
 */
export function validateEmail(email: string): string | undefined {
  if (email.length > 254) return `Email too long (max 254 chars): ${email}`;
  const at = email.indexOf("@");
  if (at < 0) return `Email must contain '@', got: ${email}`;
  const local = email.slice(0, at);
  const domain = email.slice(at + 1).replace(/\.$/, "");

  if (local.length === 0) return "Email local part (before @) cannot be empty";
  if (local.length > 64) return `Email local part too long (max 64 chars): ${local}`;
  if (local.startsWith(".") || local.endsWith(".")) {
    return `Email local part cannot start or end with '.': ${local}`;
  }
  if (local.includes("..")) {
    return `Email local part cannot contain consecutive dots: ${local}`;
  }
  if (!/^[A-Za-z0-9.+_-]+$/.test(local)) {
    return `Email local part contains invalid characters: ${local}`;
  }

  if (domain.length === 0) return "Email domain (after @) cannot be empty";
  if (!domain.includes(".")) {
    return `Email domain must contain at least one dot (e.g., 'example.com'): ${domain}`;
  }
  const labels = domain.split(".");
  for (const label of labels) {
    if (label.length === 0) return `Email domain cannot have empty labels: ${domain}`;
    if (label.length > 63) return `Email domain label too long (max 63 chars): ${label}`;
    if (label.startsWith("-") || label.endsWith("-")) {
      return `Email domain label cannot start/end with hyphen: ${label}`;
    }
    if (!/^[A-Za-z0-9-]+$/.test(label)) {
      return `Email domain label contains invalid characters: ${label}`;
    }
  }
  const tld = labels[labels.length - 1];
  if (/^\d+$/.test(tld)) return `Email domain TLD cannot be all numeric: ${tld}`;
  return undefined;
}

/**
 * Convert a mailbox into the SOA RNAME form: dots in the local part are
 * escaped and `@` becomes a label separator.
 *
 * @example formatEmail("john.doe@example.com") // "john\\.doe.example.com."
 */
export function formatEmail(email: string): string {
  const at = email.indexOf("@");
  const local = email.slice(0, at).replace(/\./g, "\\.");
  const domain = email.slice(at + 1);
  return `${local}.${domain.endsWith(".") ? domain : `${domain}.`}`;
}

/**
 * Check an SRV key such as `_http._tcp`. The message names the component
 * that lacks its leading underscore.
 */
export function validateSrvKey(key: string): string | undefined {
  const parts = key.split(".");
  if (parts.length < 2 || parts[1] === "") {
    return `SRV name must have at least service and protocol (e.g., '_http._tcp'), got: '${key}'`;
  }
  if (!parts[0].startsWith("_")) {
    return `SRV service name '${parts[0]}' must start with '_' (e.g., '_http')`;
  }
  if (!parts[1].startsWith("_")) {
    return `SRV protocol name '${parts[1]}' must start with '_' (e.g., '_tcp')`;
  }
  return undefined;
}

/**
 * Qualify a host name against a zone origin. `@` is the origin itself and a
 * name ending in a dot is returned unchanged. Without an origin relative
 * names are returned as-is and fail the fully-qualified check.
 */
export function qualifyName(name: string, origin?: string): string {
  const host = name.trim();
  if (host.endsWith(".") || !origin) return host;
  if (host === "@") return origin;
  return `${host}.${origin}`;
}

/**
 * Schema for TTL-class values (ttl, refresh, retry, expire, nrc-ttl).
 * `label` is used as the subject of every message.
 */
export function timeValueSchema(label = "TTL") {
  return z
    .number({ invalid_type_error: `${label} must be an integer` })
    .superRefine((val, ctx) => {
      let message: string | undefined;
      if (!Number.isInteger(val)) message = `${label} must be an integer`;
      else if (val === 0) message = `${label} cannot be zero`;
      else if (val < 0) message = `${label} cannot be negative`;
      else if (val > MAX_TIME_VALUE) {
        message = `${label} too large (max ${MAX_TIME_VALUE})`;
      }
      if (message) ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    });
}

export const ttlSchema = timeValueSchema("TTL");

/** Schema for 16-bit unsigned values: priorities, weights and ports */
export function uint16Schema(label: string) {
  return z
    .number({ invalid_type_error: `${label} must be an integer` })
    .superRefine((val, ctx) => {
      if (!Number.isInteger(val) || val < 0 || val > 65535) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${label} must be an integer between 0 and 65535, got: ${val}`,
        });
      }
    });
}

export const booleanSchema = z.boolean({
  invalid_type_error: "expected a boolean (true or false)",
});

export function stringSchema(label: string) {
  return z.string({ invalid_type_error: `${label} must be a string` });
}

/**
 * Schema for a host or target name. Relative names are qualified with
 * `origin` before the name rules are applied.
 */
export function hostNameSchema(origin?: string) {
  return stringSchema("Host name")
    .transform((val) => qualifyName(val, origin))
    .superRefine((val, ctx) => {
      const problem = validateDnsName(val);
      if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    });
}

/** Schema for a zone name; the trailing dot is optional in the input */
export const zoneNameSchema = stringSchema("Zone name")
  .transform((val) => {
    const name = val.trim();
    return name.endsWith(".") ? name : `${name}.`;
  })
  .superRefine((val, ctx) => {
    const problem = validateDnsName(val);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  });

export const emailSchema = stringSchema("Email").superRefine((val, ctx) => {
  const problem = validateEmail(val);
  if (problem) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid email: ${problem}` });
  }
});

export const srvKeySchema = stringSchema("SRV name").superRefine((val, ctx) => {
  const problem = validateSrvKey(val);
  if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
});

export const ipAddressSchema = z
  .string({ invalid_type_error: "IP address must be a string" })
  .transform((val, ctx) => {
    const address = parseIpAddress(val.trim());
    if (!address) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${val}' is not a valid IP address`,
      });
      return z.NEVER;
    }
    return address;
  });

/** Schema for a reverse network: CIDR text long enough to name a zone */
export const reverseNetworkSchema = z
  .string({ invalid_type_error: "Network must be a string" })
  .transform((val, ctx) => {
    const result = parseIpNetwork(val.trim());
    if (!result.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.problem });
      return z.NEVER;
    }
    const min = MIN_REVERSE_PREFIX[result.network.version];
    if (result.network.prefix < min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Prefix /${result.network.prefix} is too short for a reverse zone (min /${min})`,
      });
      return z.NEVER;
    }
    return result.network;
  });
