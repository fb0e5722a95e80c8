/**
 * Rule Engine - Applies validator rules to a parsed URI
 */

import { ComponentName, ParsedURI, ValidatorRules } from './types';
import { COMPONENT_NAMES, getComponent } from './components';
import { componentIsValid } from './validators';
import { normalizeHost, normalizeScheme } from './normalizers';
import {
  PasswordForbidden,
  MissingComponentError,
  UnpermittedComponentError,
  InvalidComponentsError
} from './errors';

const DECIMAL_PORT = /^[0-9]+$/;

export class RuleEngine {
  /**
   * Check a URI against a set of rules
   * Check order:
   * 1. Password presence (if forbidden)
   * 2. Required components - every missing one is reported together
   * 3. Allow-lists for scheme, host and port, in that order
   * 4. Component syntax - every invalid one is reported together
   *
   * Throws on the first step that finds a violation.
   */
  validate(uri: ParsedURI, rules: ValidatorRules): void {
    if (!rules.allowPassword) {
      this.checkPassword(uri);
    }

    const required = this.flagged(rules.requirePresenceOf);
    if (required.length > 0) {
      this.ensureRequiredComponentsExist(uri, required);
    }

    this.ensureOneOf(uri, 'scheme', rules.allowedSchemes, normalizeScheme);
    this.ensureOneOf(uri, 'host', rules.allowedHosts, normalizeHost);
    this.ensurePortAllowed(uri, rules.allowedPorts);

    const validated = this.flagged(rules.validateComponentsOf);
    if (validated.length > 0) {
      this.ensureComponentsAreValid(uri, validated);
    }
  }

  /**
   * A password is whatever follows the first ":" of the userinfo, if non-empty
   */
  private checkPassword(uri: ParsedURI): void {
    const userinfo = uri.userinfo;
    if (!userinfo) {
      return;
    }

    const separator = userinfo.indexOf(':');
    if (separator === -1 || separator === userinfo.length - 1) {
      return;
    }

    throw new PasswordForbidden(uri);
  }

  private ensureRequiredComponentsExist(uri: ParsedURI, required: ComponentName[]): void {
    const missing = required
      .filter((component) => getComponent(uri, component) === undefined)
      .sort();

    if (missing.length > 0) {
      throw new MissingComponentError(uri, missing);
    }
  }

  /**
   * An empty allow-list admits everything, and so does an absent value
   */
  private ensureOneOf(
    uri: ParsedURI,
    component: 'scheme' | 'host',
    allowed: ReadonlySet<string>,
    normalize: (value: string) => string
  ): void {
    const value = getComponent(uri, component);
    if (value === undefined || allowed.size === 0) {
      return;
    }

    if (!allowed.has(normalize(value))) {
      throw new UnpermittedComponentError(uri, component, value, [...allowed].sort());
    }
  }

  private ensurePortAllowed(uri: ParsedURI, allowed: ReadonlySet<number>): void {
    const value = getComponent(uri, 'port');
    if (value === undefined || allowed.size === 0) {
      return;
    }

    const port = DECIMAL_PORT.test(value) ? Number.parseInt(value, 10) : Number.NaN;
    if (!allowed.has(port)) {
      const allowedPorts = [...allowed].sort((a, b) => a - b).map(String);
      throw new UnpermittedComponentError(uri, 'port', value, allowedPorts);
    }
  }

  private ensureComponentsAreValid(uri: ParsedURI, components: ComponentName[]): void {
    const invalid = components
      .filter((component) => !componentIsValid(uri, component))
      .sort();

    if (invalid.length > 0) {
      throw new InvalidComponentsError(uri, invalid);
    }
  }

  /**
   * Component names whose flag is set, in COMPONENT_NAMES order
   */
  private flagged(flags: Readonly<Record<ComponentName, boolean>>): ComponentName[] {
    return [...COMPONENT_NAMES].filter((component) => flags[component]);
  }
}
