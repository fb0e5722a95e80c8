/**
 * RFC 3986 ABNF productions as regular expression sources.
 *
 * Every export here is an unanchored source string; PatternMatcher adds the
 * anchors when it compiles them. Groups are all non-capturing so the
 * fragments can be nested freely.
 */

// ============================================================================
// Character classes (contents only, without the surrounding brackets)
// ============================================================================

const ALPHA = 'A-Za-z';
const DIGIT = '0-9';
const UNRESERVED = `${ALPHA}${DIGIT}\\-._~`;
const SUB_DELIMS = "!$&'()*+,;=";

export const PCT_ENCODED = '%[0-9A-Fa-f]{2}';

// pchar = unreserved / pct-encoded / sub-delims / ":" / "@"
const PCHAR = `(?:[${UNRESERVED}${SUB_DELIMS}:@]|${PCT_ENCODED})`;

// ============================================================================
// scheme
// ============================================================================

export const SCHEME = `[${ALPHA}][${ALPHA}${DIGIT}+\\-.]*`;

// ============================================================================
// authority = [ userinfo "@" ] host [ ":" port ]
// ============================================================================

export const USERINFO = `(?:[${UNRESERVED}${SUB_DELIMS}:]|${PCT_ENCODED})*`;

export const PORT = `[${DIGIT}]*`;

// Loose dotted-quad shape; octet ranges are checked separately
export const IPV4 = '(?:[0-9]{1,3}\\.){3}[0-9]{1,3}';

const HEXDIG = '[0-9A-Fa-f]';
const H16 = `${HEXDIG}{1,4}`;
const LS32 = `(?:${H16}:${H16}|${IPV4})`;

const IPV6_FORMS = [
  `(?:${H16}:){6}${LS32}`,
  `::(?:${H16}:){5}${LS32}`,
  `(?:${H16})?::(?:${H16}:){4}${LS32}`,
  `(?:(?:${H16}:){0,1}${H16})?::(?:${H16}:){3}${LS32}`,
  `(?:(?:${H16}:){0,2}${H16})?::(?:${H16}:){2}${LS32}`,
  `(?:(?:${H16}:){0,3}${H16})?::${H16}:${LS32}`,
  `(?:(?:${H16}:){0,4}${H16})?::${LS32}`,
  `(?:(?:${H16}:){0,5}${H16})?::${H16}`,
  `(?:(?:${H16}:){0,6}${H16})?::`
];

export const IPV6 = `(?:${IPV6_FORMS.join('|')})`;

// RFC 6874 zone identifier, "%25" followed by the zone
const ZONE_ID = `%25(?:[${UNRESERVED}]|${PCT_ENCODED})+`;

const IPV_FUTURE = `v${HEXDIG}+\\.[${UNRESERVED}${SUB_DELIMS}:]+`;

export const IP_LITERAL = `\\[(?:${IPV6}(?:${ZONE_ID})?|${IPV_FUTURE})\\]`;

export const REG_NAME = `(?:[${UNRESERVED}${SUB_DELIMS}]|${PCT_ENCODED})*`;

export const HOST = `(?:${IP_LITERAL}|${IPV4}|${REG_NAME})`;

export const SUBAUTHORITY = `(?:${USERINFO}@)?${HOST}(?::${PORT})?`;

// ============================================================================
// path, query, fragment
// ============================================================================

// Superset of path-abempty, path-absolute, path-noscheme, path-rootless and
// path-empty: any run of pchar and "/".
export const PATH = `(?:${PCHAR}|\\/)*`;

export const QUERY = `(?:${PCHAR}|[/?])*`;

export const FRAGMENT = `(?:${PCHAR}|[/?])*`;
