#!/usr/bin/env node
/**
 * urivet - Main entry point
 */

import { CLI } from './cli';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

export * from './types';
export { COMPONENT_NAMES, isComponentName, getComponent } from './components';
export { Validator } from './validator';
export { RuleEngine } from './rule-engine';
export { PatternMatcher } from './pattern-matcher';
export {
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
export {
  isValid,
  authorityIsValid,
  schemeIsValid,
  pathIsValid,
  queryIsValid,
  fragmentIsValid,
  userinfoIsValid,
  hostIsValid,
  portIsValid,
  validIPv4HostAddress,
  componentIsValid
} from './validators';
export { normalizeScheme, normalizeHost, normalizePercentCharacters } from './normalizers';
export {
  ValidationError,
  PasswordForbidden,
  MissingComponentError,
  UnpermittedComponentError,
  InvalidComponentsError,
  ConfigurationError
} from './errors';
export type { ValidationErrorCode } from './errors';
export { parseURIReference, toURIString } from './uri-reference';
export { PolicyParser } from './policy-parser';
export type { PolicyPaths } from './policy-parser';
export { CLI } from './cli';
export { OutputFormatter } from './output-formatter';
