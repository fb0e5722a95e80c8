/**
 * Core type definitions for urivet
 */

// ============================================================================
// URI Types
// ============================================================================

export type ComponentName =
  | 'scheme'
  | 'userinfo'
  | 'host'
  | 'port'
  | 'path'
  | 'query'
  | 'fragment';

/**
 * A URI reference split into its RFC 3986 components.
 * An absent component is `undefined`, which is not the same as empty.
 */
export interface ParsedURI {
  readonly scheme?: string;
  readonly userinfo?: string;
  readonly host?: string;
  readonly port?: string | number;
  readonly path?: string;
  readonly query?: string;
  readonly fragment?: string;
}

// ============================================================================
// Validator Types
// ============================================================================

/**
 * Snapshot of everything a Validator has been configured with.
 * The rule engine only ever reads this.
 */
export interface ValidatorRules {
  allowedSchemes: ReadonlySet<string>;
  allowedHosts: ReadonlySet<string>;
  allowedPorts: ReadonlySet<number>;
  allowPassword: boolean;
  requirePresenceOf: Readonly<Record<ComponentName, boolean>>;
  validateComponentsOf: Readonly<Record<ComponentName, boolean>>;
}

// ============================================================================
// Policy File Types
// ============================================================================

export enum DirectiveType {
  REQUIRE = 'require',
  CHECK = 'check',
  ALLOW_SCHEME = 'allow-scheme',
  ALLOW_HOST = 'allow-host',
  ALLOW_PORT = 'allow-port',
  ALLOW_PASSWORD = 'allow-password',
  FORBID_PASSWORD = 'forbid-password'
}

export enum PolicySource {
  GLOBAL = 'global',    // /etc/urivet/policy
  USER = 'user',        // ~/.config/urivet/policy
  PROJECT = 'project'   // ./.urivet
}

export interface PolicyDirective {
  type: DirectiveType;
  values: string[];
  source: PolicySource;
  lineNumber: number;
}

export interface PolicyParseResult {
  directives: PolicyDirective[];
  errors: PolicyParseError[];
}

export interface PolicyParseError {
  line: number;
  message: string;
  source: PolicySource;
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CheckOptions {
  uri: string;
  policyPath?: string;      // Replaces the standard policy locations
  require: string[];
  check: string[];
  allowSchemes: string[];
  allowHosts: string[];
  allowPorts: string[];
  forbidPassword: boolean;
  verbose: boolean;
}
