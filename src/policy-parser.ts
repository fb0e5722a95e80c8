/**
 * Policy Parser - Loads .urivet policy files and applies them to a Validator
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { DirectiveType, PolicyDirective, PolicySource, PolicyParseResult, PolicyParseError } from './types';
import { isComponentName } from './components';
import { Validator } from './validator';

export interface PolicyPaths {
  global: string;
  user: string;
  project: string;
}

const DIRECTIVE_TYPES: ReadonlyMap<string, DirectiveType> = new Map(
  Object.values(DirectiveType).map((type): [string, DirectiveType] => [type, type])
);

const FLAG_DIRECTIVES: ReadonlySet<DirectiveType> = new Set([
  DirectiveType.ALLOW_PASSWORD,
  DirectiveType.FORBID_PASSWORD
]);

const INTEGER = /^[+-]?[0-9]+$/;

export class PolicyParser {
  private readonly paths?: Partial<PolicyPaths>;

  constructor(paths?: Partial<PolicyPaths>) {
    this.paths = paths;
  }

  /**
   * Parse a single policy file
   */
  parse(filePath: string, source: PolicySource): PolicyParseResult {
    const directives: PolicyDirective[] = [];
    const errors: PolicyParseError[] = [];

    // A missing file is not an error - it just contributes nothing
    if (!fs.existsSync(filePath)) {
      return { directives, errors };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      errors.push({
        line: 0,
        message: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`,
        source
      });
      return { directives, errors };
    }

    return this.parseContent(content, source);
  }

  /**
   * Parse policy text. Bad lines are recorded and skipped.
   */
  parseContent(content: string, source: PolicySource): PolicyParseResult {
    const directives: PolicyDirective[] = [];
    const errors: PolicyParseError[] = [];
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      const line = lines[i].trim();

      if (line === '' || line.startsWith('#')) {
        continue;
      }

      try {
        directives.push(this.parseLine(line, source, lineNumber));
      } catch (error) {
        errors.push({
          line: lineNumber,
          message: error instanceof Error ? error.message : String(error),
          source
        });
      }
    }

    return { directives, errors };
  }

  /**
   * Parse a single line into a PolicyDirective
   */
  private parseLine(line: string, source: PolicySource, lineNumber: number): PolicyDirective {
    const [keyword, ...values] = line.split(/\s+/);
    const type = DIRECTIVE_TYPES.get(keyword.toLowerCase());

    if (type === undefined) {
      throw new Error(`Unknown directive: ${keyword}`);
    }

    if (FLAG_DIRECTIVES.has(type)) {
      if (values.length > 0) {
        throw new Error(`${type} takes no values`);
      }
    } else if (values.length === 0) {
      throw new Error(`${type} directive missing values`);
    }

    if (type === DirectiveType.REQUIRE || type === DirectiveType.CHECK) {
      const unknown = values.find((value) => !isComponentName(value.toLowerCase()));
      if (unknown !== undefined) {
        throw new Error(`"${unknown}" is not a valid component`);
      }
    }

    if (type === DirectiveType.ALLOW_PORT) {
      const invalid = values.find((value) => !INTEGER.test(value));
      if (invalid !== undefined) {
        throw new Error(`"${invalid}" is not a valid port`);
      }
    }

    return { type, values, source, lineNumber };
  }

  /**
   * Load directives from all standard locations, in order global, user, project
   */
  loadAll(): PolicyDirective[] {
    const directives: PolicyDirective[] = [];

    const sources: Array<[string, PolicySource]> = [
      [this.paths?.global ?? '/etc/urivet/policy', PolicySource.GLOBAL],
      [this.paths?.user ?? path.join(os.homedir(), '.config', 'urivet', 'policy'), PolicySource.USER],
      [this.paths?.project ?? path.join(process.cwd(), '.urivet'), PolicySource.PROJECT]
    ];

    for (const [filePath, source] of sources) {
      directives.push(...this.loadFile(filePath, source));
    }

    return directives;
  }

  /**
   * Load directives from one file, logging any line errors
   */
  loadFile(filePath: string, source: PolicySource = PolicySource.PROJECT): PolicyDirective[] {
    const result = this.parse(filePath, source);
    this.logErrors(result.errors);
    return result.directives;
  }

  /**
   * Replay directives onto a validator in order, so later sources win for
   * the password flag and add to everything else
   */
  apply(directives: PolicyDirective[], validator: Validator = new Validator()): Validator {
    for (const directive of directives) {
      switch (directive.type) {
        case DirectiveType.REQUIRE:
          validator.requireComponents(...directive.values);
          break;
        case DirectiveType.CHECK:
          validator.checkValidityOf(...directive.values);
          break;
        case DirectiveType.ALLOW_SCHEME:
          validator.allowSchemes(...directive.values);
          break;
        case DirectiveType.ALLOW_HOST:
          validator.allowHosts(...directive.values);
          break;
        case DirectiveType.ALLOW_PORT:
          validator.allowPorts(...directive.values);
          break;
        case DirectiveType.ALLOW_PASSWORD:
          validator.allowUseOfPassword();
          break;
        case DirectiveType.FORBID_PASSWORD:
          validator.forbidUseOfPassword();
          break;
      }
    }
    return validator;
  }

  /**
   * Log parse errors to stderr
   */
  private logErrors(errors: PolicyParseError[]): void {
    for (const error of errors) {
      if (error.line === 0) {
        console.error(`Warning: ${error.message} (${error.source})`);
      } else {
        console.error(`Warning: Invalid policy at line ${error.line} in ${error.source}: ${error.message}`);
      }
    }
  }
}
