/**
 * Pattern Matcher - Full-string predicates over RFC 3986 productions
 */

import * as abnf from './abnf';

export class PatternMatcher {
  private readonly regex: RegExp;

  /**
   * @param name - Production name, used in messages and debugging
   * @param source - Unanchored regular expression source
   */
  constructor(readonly name: string, readonly source: string) {
    // Match full string (anchor at start and end)
    this.regex = new RegExp(`^(?:${source})$`);
  }

  /**
   * True when the entire value conforms to the production.
   * A prefix match is not enough.
   */
  matches(value: string): boolean {
    return this.regex.test(value);
  }
}

export const SCHEME_MATCHER = new PatternMatcher('scheme', abnf.SCHEME);
export const SUBAUTHORITY_MATCHER = new PatternMatcher('subauthority', abnf.SUBAUTHORITY);
export const USERINFO_MATCHER = new PatternMatcher('userinfo', abnf.USERINFO);
export const HOST_MATCHER = new PatternMatcher('host', abnf.HOST);
export const PORT_MATCHER = new PatternMatcher('port', abnf.PORT);
export const PATH_MATCHER = new PatternMatcher('path', abnf.PATH);
export const QUERY_MATCHER = new PatternMatcher('query', abnf.QUERY);
export const FRAGMENT_MATCHER = new PatternMatcher('fragment', abnf.FRAGMENT);
export const IPV4_MATCHER = new PatternMatcher('IPv4address', abnf.IPV4);
