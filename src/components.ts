/**
 * Component names and accessors
 */

import { ComponentName, ParsedURI } from './types';

export const COMPONENT_NAMES: ReadonlySet<ComponentName> = new Set<ComponentName>([
  'scheme',
  'userinfo',
  'host',
  'port',
  'path',
  'query',
  'fragment'
]);

const NAME_LOOKUP: ReadonlySet<string> = COMPONENT_NAMES;

/**
 * Read a component off a URI by name. Ports given as numbers come back as
 * their decimal string.
 */
export const COMPONENT_ACCESSORS: Readonly<Record<ComponentName, (uri: ParsedURI) => string | undefined>> = {
  scheme: (uri) => uri.scheme,
  userinfo: (uri) => uri.userinfo,
  host: (uri) => uri.host,
  port: (uri) => (uri.port === undefined ? undefined : String(uri.port)),
  path: (uri) => uri.path,
  query: (uri) => uri.query,
  fragment: (uri) => uri.fragment
};

export function isComponentName(name: string): name is ComponentName {
  return NAME_LOOKUP.has(name);
}

export function getComponent(uri: ParsedURI, component: ComponentName): string | undefined {
  return COMPONENT_ACCESSORS[component](uri);
}

/**
 * A fresh name -> false mapping, one flag per component.
 */
export function emptyComponentFlags(): Record<ComponentName, boolean> {
  return {
    scheme: false,
    userinfo: false,
    host: false,
    port: false,
    path: false,
    query: false,
    fragment: false
  };
}
