/**
 * Validator - Configurable URI policy
 *
 * Configuration calls mutate the validator and return it, so they chain.
 * Repeated calls add to what is already configured.
 *
 * @example
 * const validator = new Validator()
 *   .requireComponents('scheme', 'host', 'path')
 *   .allowSchemes('http', 'https')
 *   .allowHosts('127.0.0.1', 'example.com');
 *
 * validator.validate(parseURIReference('https://example.com/'));
 * validator.validate(parseURIReference('imap://mail.example.com'));
 * // throws MissingComponentError (path)
 */

import { ComponentName, ParsedURI, ValidatorRules } from './types';
import { emptyComponentFlags, isComponentName } from './components';
import { normalizeHost, normalizeScheme } from './normalizers';
import { RuleEngine } from './rule-engine';
import { ConfigurationError } from './errors';

const MIN_PORT = 0;
const MAX_PORT = 65535;
const INTEGER = /^[+-]?[0-9]+$/;

export class Validator {
  private readonly schemes = new Set<string>();
  private readonly hosts = new Set<string>();
  private readonly ports = new Set<number>();
  private passwordAllowed = true;
  private readonly required = emptyComponentFlags();
  private readonly checked = emptyComponentFlags();
  private readonly engine = new RuleEngine();

  get allowedSchemes(): ReadonlySet<string> {
    return this.schemes;
  }

  get allowedHosts(): ReadonlySet<string> {
    return this.hosts;
  }

  get allowedPorts(): ReadonlySet<number> {
    return this.ports;
  }

  get allowPassword(): boolean {
    return this.passwordAllowed;
  }

  get requirePresenceOf(): Readonly<Record<ComponentName, boolean>> {
    return this.required;
  }

  get validateComponentsOf(): Readonly<Record<ComponentName, boolean>> {
    return this.checked;
  }

  /**
   * Require the scheme to be one of the provided schemes (without "://")
   */
  allowSchemes(...schemes: string[]): this {
    for (const scheme of schemes) {
      this.schemes.add(normalizeScheme(scheme));
    }
    return this;
  }

  /**
   * Require the host to be one of the provided hosts
   */
  allowHosts(...hosts: string[]): this {
    for (const host of hosts) {
      this.hosts.add(normalizeHost(host));
    }
    return this;
  }

  /**
   * Require the port to be one of the provided ports
   * Ports outside 0-65535 are dropped without complaint; a value that is not
   * an integer at all is a configuration error.
   */
  allowPorts(...ports: Array<string | number>): this {
    const parsed = ports.map((port) => this.parsePort(port));
    for (const port of parsed) {
      if (port >= MIN_PORT && port <= MAX_PORT) {
        this.ports.add(port);
      }
    }
    return this;
  }

  allowUseOfPassword(): this {
    this.passwordAllowed = true;
    return this;
  }

  forbidUseOfPassword(): this {
    this.passwordAllowed = false;
    return this;
  }

  /**
   * Require the named components to be present. Names are case-insensitive.
   */
  requireComponents(...components: string[]): this {
    for (const component of this.componentNames(components)) {
      this.required[component] = true;
    }
    return this;
  }

  /**
   * Check the syntax of the named components whenever they are present
   */
  checkValidityOf(...components: string[]): this {
    for (const component of this.componentNames(components)) {
      this.checked[component] = true;
    }
    return this;
  }

  /**
   * Check a parsed URI against everything configured so far
   * @throws PasswordForbidden, MissingComponentError, UnpermittedComponentError or InvalidComponentsError
   */
  validate(uri: ParsedURI): void {
    this.engine.validate(uri, this.rules());
  }

  rules(): ValidatorRules {
    return {
      allowedSchemes: this.schemes,
      allowedHosts: this.hosts,
      allowedPorts: this.ports,
      allowPassword: this.passwordAllowed,
      requirePresenceOf: this.required,
      validateComponentsOf: this.checked
    };
  }

  /**
   * Lower-case and check every name before any flag is touched
   */
  private componentNames(components: string[]): ComponentName[] {
    return components.map((component) => {
      const name = component.toLowerCase();
      if (!isComponentName(name)) {
        throw new ConfigurationError(`"${name}" is not a valid component`);
      }
      return name;
    });
  }

  private parsePort(port: string | number): number {
    if (typeof port === 'number') {
      if (!Number.isInteger(port)) {
        throw new ConfigurationError(`"${port}" is not a valid port`);
      }
      return port;
    }

    const trimmed = port.trim();
    if (!INTEGER.test(trimmed)) {
      throw new ConfigurationError(`"${port}" is not a valid port`);
    }
    return Number.parseInt(trimmed, 10);
  }
}
