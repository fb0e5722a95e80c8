/**
 * Validators - Free functions checking single components against the grammar
 *
 * Every function takes `require` last. When it is false an absent value is
 * valid; when it is true the value must be present and well formed.
 */

import { ComponentName, ParsedURI } from './types';
import { getComponent } from './components';
import {
  PatternMatcher,
  SCHEME_MATCHER,
  SUBAUTHORITY_MATCHER,
  USERINFO_MATCHER,
  HOST_MATCHER,
  PORT_MATCHER,
  PATH_MATCHER,
  QUERY_MATCHER,
  FRAGMENT_MATCHER,
  IPV4_MATCHER
} from './pattern-matcher';

const MAX_PORT = 65535;
const DECIMAL_OCTET = /^[0-9]+$/;

/**
 * Determine if a value is valid based on the provided matcher
 */
export function isValid(value: string | undefined, matcher: PatternMatcher, require: boolean): boolean {
  if (require) {
    return value !== undefined && matcher.matches(value);
  }

  return value === undefined || matcher.matches(value);
}

/**
 * Determine if the authority string is valid
 *
 * A host that looks like a dotted quad is held to the stricter octet range
 * check, so "999.1.1.1" fails even though it is a legal reg-name.
 */
export function authorityIsValid(authority: string | undefined, host?: string, require: boolean = false): boolean {
  const validated = isValid(authority, SUBAUTHORITY_MATCHER, require);
  if (validated && host !== undefined && IPV4_MATCHER.matches(host)) {
    return validIPv4HostAddress(host);
  }
  return validated;
}

export function schemeIsValid(scheme: string | undefined, require: boolean = false): boolean {
  return isValid(scheme, SCHEME_MATCHER, require);
}

export function pathIsValid(path: string | undefined, require: boolean = false): boolean {
  return isValid(path, PATH_MATCHER, require);
}

export function queryIsValid(query: string | undefined, require: boolean = false): boolean {
  return isValid(query, QUERY_MATCHER, require);
}

export function fragmentIsValid(fragment: string | undefined, require: boolean = false): boolean {
  return isValid(fragment, FRAGMENT_MATCHER, require);
}

export function userinfoIsValid(userinfo: string | undefined, require: boolean = false): boolean {
  return isValid(userinfo, USERINFO_MATCHER, require);
}

/**
 * Same dotted-quad rule as authorityIsValid, applied to a bare host.
 */
export function hostIsValid(host: string | undefined, require: boolean = false): boolean {
  const validated = isValid(host, HOST_MATCHER, require);
  if (validated && host !== undefined && IPV4_MATCHER.matches(host)) {
    return validIPv4HostAddress(host);
  }
  return validated;
}

/**
 * Ports are digits only; a non-empty port must also fit in 16 bits.
 */
export function portIsValid(port: string | undefined, require: boolean = false): boolean {
  const validated = isValid(port, PORT_MATCHER, require);
  if (validated && port !== undefined && port !== '') {
    return Number.parseInt(port, 10) <= MAX_PORT;
  }
  return validated;
}

/**
 * Determine if the given host is a valid IPv4 address
 * Exactly four decimal parts, each in [0, 255]. Leading zeros are accepted.
 */
export function validIPv4HostAddress(host: string): boolean {
  const octets = host.split('.');
  if (octets.length !== 4) {
    return false;
  }

  return octets.every((octet) => DECIMAL_OCTET.test(octet) && Number.parseInt(octet, 10) <= 255);
}

const COMPONENT_VALIDATORS: Readonly<Record<ComponentName, (value: string | undefined) => boolean>> = {
  scheme: (value) => schemeIsValid(value),
  userinfo: (value) => userinfoIsValid(value),
  host: (value) => hostIsValid(value),
  port: (value) => portIsValid(value),
  path: (value) => pathIsValid(value),
  query: (value) => queryIsValid(value),
  fragment: (value) => fragmentIsValid(value)
};

/**
 * Check one named component of a URI against its production
 * An absent component is valid.
 */
export function componentIsValid(uri: ParsedURI, component: ComponentName): boolean {
  return COMPONENT_VALIDATORS[component](getComponent(uri, component));
}
