/** Where a request came from, as seen by the HTTP server */
export interface RequestOrigin {
  /** Raw `X-Forwarded-For` header */
  forwardedFor?: string;
  /** Raw `X-Real-IP` header */
  realIp?: string;
  /** Connection peer address, possibly with a `:port` suffix */
  remoteAddress?: string;
}

const IPV4_MAPPED_PREFIX = '::ffff:';

/**
 * Strip a port suffix from a peer address.
 *
 * - `192.168.1.1:12345` → `192.168.1.1`
 * - `[2001:db8::1]:443` → `2001:db8::1`
 * - `2001:db8::1` → `2001:db8::1` (bare IPv6 has no port to strip)
 * - `::ffff:10.0.0.7` → `10.0.0.7` (IPv4-mapped peers as reported by Node)
 */
export function stripPort(address: string): string {
  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    return end === -1 ? address : address.slice(1, end);
  }

  if (address.toLowerCase().startsWith(IPV4_MAPPED_PREFIX)) {
    const mapped = address.slice(IPV4_MAPPED_PREFIX.length);
    if (mapped.split('.').length === 4) return mapped;
  }

  const firstColon = address.indexOf(':');
  if (firstColon !== -1 && firstColon === address.lastIndexOf(':')) {
    return address.slice(0, firstColon);
  }
  return address;
}

/**
 * Derive the caller's address when the request carries none.
 *
 * Priority: first `X-Forwarded-For` entry, then `X-Real-IP`, then the peer address.
 */
export function clientAddress(origin: RequestOrigin): string {
  if (origin.forwardedFor) {
    return origin.forwardedFor.split(',')[0]?.trim() ?? '';
  }
  if (origin.realIp) {
    return origin.realIp;
  }
  return stripPort(origin.remoteAddress ?? '');
}

/**
 * Address syntax check.
 *
 * Four dot-separated non-empty segments pass as IPv4 (no range check, so
 * `999.999.999.999` passes); anything containing a colon passes as IPv6.
 */
export function isValidAddress(address: string): boolean {
  const parts = address.split('.');
  if (parts.length === 4) {
    return parts.every((part) => part !== '');
  }
  return address.includes(':');
}

/** DNS record type carrying an address */
export function recordTypeFor(address: string): 'A' | 'AAAA' {
  return address.includes(':') ? 'AAAA' : 'A';
}
