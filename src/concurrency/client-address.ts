/**
 * Client address parsing for per-client rate limiting.
 *
 * @module marquee/concurrency/client-address
 */

/**
 * Result of splitting a `host:port` remote address.
 */
export type SplitAddress =
  | { ok: true; host: string; port: string }
  | { ok: false; reason: string };

/**
 * Split a `host:port` address. IPv6 hosts must be bracketed (`[::1]:8080`).
 * The host comes back without brackets.
 *
 * @example
 * ```typescript
 * splitHostPort("203.0.113.7:51234"); // { ok: true, host: "203.0.113.7", port: "51234" }
 * splitHostPort("[::1]:80");          // { ok: true, host: "::1", port: "80" }
 * splitHostPort("203.0.113.7");       // { ok: false, reason: "missing port in address" }
 * ```
 */
export function splitHostPort(address: string): SplitAddress {
  const fail = (reason: string): SplitAddress => ({ ok: false, reason });

  const lastColon = address.lastIndexOf(":");
  if (lastColon < 0) return fail("missing port in address");

  let host: string;
  // Search offsets for stray brackets
  let openFrom = 0;
  let closeFrom = 0;
  if (address.startsWith("[")) {
    const close = address.indexOf("]");
    if (close < 0) return fail("missing ']' in address");
    if (close + 1 === address.length) return fail("missing port in address");
    if (close + 1 !== lastColon) {
      return fail(
        address[close + 1] === ":"
          ? "too many colons in address"
          : "missing port in address",
      );
    }
    host = address.slice(1, close);
    openFrom = 1;
    closeFrom = close + 1;
  } else {
    host = address.slice(0, lastColon);
    if (host.includes(":")) return fail("too many colons in address");
  }

  if (address.indexOf("[", openFrom) >= 0) {
    return fail("unexpected '[' in address");
  }
  if (address.indexOf("]", closeFrom) >= 0) {
    return fail("unexpected ']' in address");
  }

  return { ok: true, host, port: address.slice(lastColon + 1) };
}
