/**
 * OutputFormatter - Console output for the urivet CLI
 *
 * Valid results and component listings go to stdout; violations and
 * errors go to stderr.
 */

import { ParsedURI } from './types';
import { COMPONENT_NAMES, getComponent } from './components';
import { ValidationError } from './errors';

export class OutputFormatter {
  /**
   * Display a URI that passed every configured check
   */
  displayValid(uri: string): void {
    console.log(`✅ VALID: ${uri}`);
  }

  /**
   * Display a URI that violated the policy
   */
  displayInvalid(uri: string, error: ValidationError): void {
    const output = [
      `🚫 INVALID: ${uri}`,
      `Violation: ${error.code}`,
      `Reason: ${error.message}`
    ];

    console.error(output.join('\n'));
  }

  /**
   * Display each component of a parsed URI, one per line
   * Absent components are shown as "(absent)" to tell them apart from empty ones.
   */
  displayComponents(uri: ParsedURI): void {
    const width = Math.max(...[...COMPONENT_NAMES].map((name) => name.length));
    const lines = [...COMPONENT_NAMES].map((name) => {
      const value = getComponent(uri, name);
      return `  ${name.padEnd(width)}  ${value === undefined ? '(absent)' : JSON.stringify(value)}`;
    });

    console.log(['Components:', ...lines].join('\n'));
  }

  displayError(message: string): void {
    console.error(`❌ Error: ${message}`);
  }
}
