// URL guard: rejects fetch targets that resolve into private, loopback,
// link-local or metadata address space

import { lookup } from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import { errorMessage } from "@wayfarer/core";

export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

/** Resolves a hostname to every address it maps to. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export interface UrlGuardOptions {
  readonly resolve?: HostResolver;
}

export const BLOCKED_HOSTNAMES: ReadonlySet<string> = new Set([
  "localhost",
  "metadata.google.internal",
  "169.254.169.254",
]);

const PRIVATE_RANGES = new BlockList();
PRIVATE_RANGES.addSubnet("0.0.0.0", 8, "ipv4");
PRIVATE_RANGES.addSubnet("10.0.0.0", 8, "ipv4");
PRIVATE_RANGES.addSubnet("100.64.0.0", 10, "ipv4");
PRIVATE_RANGES.addSubnet("127.0.0.0", 8, "ipv4");
PRIVATE_RANGES.addSubnet("169.254.0.0", 16, "ipv4");
PRIVATE_RANGES.addSubnet("172.16.0.0", 12, "ipv4");
PRIVATE_RANGES.addSubnet("192.168.0.0", 16, "ipv4");
PRIVATE_RANGES.addSubnet("::", 128, "ipv6");
PRIVATE_RANGES.addSubnet("::1", 128, "ipv6");
PRIVATE_RANGES.addSubnet("fc00::", 7, "ipv6");
PRIVATE_RANGES.addSubnet("fe80::", 10, "ipv6");

export const resolveHost: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true });
  return records.map((r) => r.address);
};

/** The IPv4 address inside an IPv4-mapped IPv6 address (`::ffff:a.b.c.d` or `::ffff:7f00:1`). */
function unmapIPv4(address: string): string | null {
  const lower = address.toLowerCase();
  const dotted = lower.match(/^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/);
  if (dotted?.[1]) return dotted[1];
  const hex = lower.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (!hex?.[1] || !hex[2]) return null;
  const high = parseInt(hex[1], 16);
  const low = parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
}

/** True when `address` lies in a range a fetch must never reach. */
export function isPrivateAddress(address: string): boolean {
  const mapped = unmapIPv4(address);
  if (mapped !== null) return isPrivateAddress(mapped);
  const family = isIP(address);
  if (family === 4) return PRIVATE_RANGES.check(address, "ipv4");
  if (family === 6) return PRIVATE_RANGES.check(address, "ipv6");
  return true;
}

/** URL hostnames keep the brackets around IPv6 literals. */
function bareHostname(url: URL): string {
  const host = url.hostname.toLowerCase();
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host;
}

/**
 * Check that `url` is an http(s) URL whose host resolves only to public
 * addresses. Literal IPs are checked as they are; names go through the
 * resolver, and a resolution failure rejects the URL.
 */
export async function validateUrl(url: string, options: UrlGuardOptions = {}): Promise<ValidationResult> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, reason: `Invalid URL: ${url}` };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { valid: false, reason: `Only http and https URLs are allowed, got ${parsed.protocol.replace(/:$/, "")}` };
  }

  const hostname = bareHostname(parsed);
  if (!hostname) {
    return { valid: false, reason: "URL has no hostname" };
  }
  if (BLOCKED_HOSTNAMES.has(hostname)) {
    return { valid: false, reason: `Blocked hostname: ${hostname}` };
  }

  let addresses: string[];
  if (isIP(hostname) !== 0) {
    addresses = [hostname];
  } else {
    const resolve = options.resolve ?? resolveHost;
    try {
      addresses = await resolve(hostname);
    } catch (e) {
      return { valid: false, reason: `Could not resolve ${hostname}: ${errorMessage(e)}` };
    }
  }

  if (addresses.length === 0) {
    return { valid: false, reason: `Could not resolve ${hostname}` };
  }

  const blocked = addresses.find(isPrivateAddress);
  if (blocked !== undefined) {
    return { valid: false, reason: `${hostname} resolves to private address ${blocked}` };
  }

  return { valid: true };
}
