/**
 * URI Reference - Splits a URI string into components and joins them back
 *
 * Splitting never validates: any string produces a ParsedURI, and the
 * validators decide whether the pieces are well formed.
 */

import { ParsedURI } from './types';

// RFC 3986 Appendix B
const URI_REFERENCE = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

interface AuthorityParts {
  userinfo?: string;
  host: string;
  port?: string;
}

/**
 * Parse a URI reference into its components
 * Absent groups stay undefined; an empty path is treated as absent.
 */
export function parseURIReference(value: string): ParsedURI {
  const match = URI_REFERENCE.exec(value);
  if (!match) {
    // The Appendix B expression matches every string
    return { path: value || undefined };
  }

  const [, scheme, authority, path, query, fragment] = match;
  const authorityParts = authority === undefined ? undefined : splitAuthority(authority);

  return {
    scheme,
    userinfo: authorityParts?.userinfo,
    host: authorityParts?.host,
    port: authorityParts?.port,
    path: path === '' ? undefined : path,
    query,
    fragment
  };
}

/**
 * Split "userinfo@host:port" into its parts
 * The userinfo ends at the last "@"; a port is only recognised outside an IP literal.
 */
function splitAuthority(authority: string): AuthorityParts {
  const at = authority.lastIndexOf('@');
  const userinfo = at === -1 ? undefined : authority.slice(0, at);
  const hostPort = at === -1 ? authority : authority.slice(at + 1);

  let host = hostPort;
  let port: string | undefined;

  if (hostPort.startsWith('[')) {
    const close = hostPort.indexOf(']');
    if (close !== -1 && hostPort.charAt(close + 1) === ':') {
      host = hostPort.slice(0, close + 1);
      port = hostPort.slice(close + 2);
    }
  } else {
    const colon = hostPort.lastIndexOf(':');
    if (colon !== -1) {
      host = hostPort.slice(0, colon);
      port = hostPort.slice(colon + 1);
    }
  }

  return {
    userinfo,
    host,
    port: port === '' ? undefined : port
  };
}

/**
 * Recompose a URI string from its components (RFC 3986 §5.3)
 */
export function toURIString(uri: ParsedURI): string {
  let result = '';

  if (uri.scheme !== undefined) {
    result += `${uri.scheme}:`;
  }

  if (uri.userinfo !== undefined || uri.host !== undefined || uri.port !== undefined) {
    result += '//';
    if (uri.userinfo !== undefined) {
      result += `${uri.userinfo}@`;
    }
    result += uri.host ?? '';
    if (uri.port !== undefined) {
      result += `:${uri.port}`;
    }
  }

  result += uri.path ?? '';

  if (uri.query !== undefined) {
    result += `?${uri.query}`;
  }
  if (uri.fragment !== undefined) {
    result += `#${uri.fragment}`;
  }

  return result;
}
