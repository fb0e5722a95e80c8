/**
 * Error classes for validator configuration and URI validation.
 * Each carries a stable `code` so callers can branch without instanceof.
 */

import { ComponentName, ParsedURI } from './types';
import { toURIString } from './uri-reference';

export type ValidationErrorCode =
  | 'ERR_PASSWORD_FORBIDDEN'
  | 'ERR_MISSING_COMPONENT'
  | 'ERR_UNPERMITTED_COMPONENT'
  | 'ERR_INVALID_COMPONENT';

/**
 * Misuse of the Validator API, raised while configuring and never by validate().
 */
export class ConfigurationError extends RangeError {
  public readonly code = 'ERR_INVALID_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Base class for every policy violation found by Validator.validate().
 */
export abstract class ValidationError extends Error {
  public abstract readonly code: ValidationErrorCode;

  constructor(readonly uri: ParsedURI, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PasswordForbidden extends ValidationError {
  public readonly code = 'ERR_PASSWORD_FORBIDDEN';

  constructor(uri: ParsedURI) {
    super(uri, `"${toURIString(uri)}" contains a password, which is forbidden`);
  }
}

export class MissingComponentError extends ValidationError {
  public readonly code = 'ERR_MISSING_COMPONENT';

  constructor(uri: ParsedURI, readonly components: readonly ComponentName[]) {
    super(uri, `"${toURIString(uri)}" is missing required ${plural(components)}: ${components.join(', ')}`);
  }
}

export class UnpermittedComponentError extends ValidationError {
  public readonly code = 'ERR_UNPERMITTED_COMPONENT';

  constructor(
    uri: ParsedURI,
    readonly component: ComponentName,
    readonly value: string,
    readonly allowed: readonly string[]
  ) {
    super(
      uri,
      `"${toURIString(uri)}" has ${component} "${value}", which is not one of the allowed values: ${allowed.join(', ')}`
    );
  }
}

export class InvalidComponentsError extends ValidationError {
  public readonly code = 'ERR_INVALID_COMPONENT';

  constructor(uri: ParsedURI, readonly components: readonly ComponentName[]) {
    super(uri, `"${toURIString(uri)}" has invalid ${plural(components)}: ${components.join(', ')}`);
  }
}

function plural(components: readonly ComponentName[]): string {
  return components.length === 1 ? 'component' : 'components';
}
