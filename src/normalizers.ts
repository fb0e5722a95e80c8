/**
 * Normalizers - Canonical forms for allow-list comparison
 */

const PERCENT_ENCODED = /%[0-9A-Fa-f]{2}/g;

/**
 * Schemes are case-insensitive (RFC 3986 §3.1); the canonical form is lowercase.
 */
export function normalizeScheme(scheme: string): string {
  return scheme.toLowerCase();
}

/**
 * Hosts are case-insensitive (RFC 3986 §3.2.2), except for the zone
 * identifier of an IPv6 literal, which is kept as written. Percent-encoded
 * octets in a reg-name get uppercase hex digits.
 */
export function normalizeHost(host: string): string {
  if (host.length > 4 && host.startsWith('[') && host.endsWith(']')) {
    const percent = host.indexOf('%');
    if (percent !== -1) {
      return host.slice(0, percent).toLowerCase() + host.slice(percent);
    }
  }
  return normalizePercentCharacters(host.toLowerCase());
}

/**
 * Uppercase the hex digits of every percent-encoded octet (RFC 3986 §6.2.2.1).
 */
export function normalizePercentCharacters(value: string): string {
  return value.replace(PERCENT_ENCODED, (octet) => octet.toUpperCase());
}
