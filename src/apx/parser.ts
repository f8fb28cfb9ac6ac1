/**
 * Parser for the APX argumentation framework format.
 *
 * An APX document lists one statement per line:
 *
 * ```text
 * arg(a).
 * arg(b).
 * att(a,b).
 * ```
 *
 * Names are sequences of letters, digits and underscores. Statements may
 * come in any order: an attack may precede the `arg` lines of its
 * endpoints, since only the complete document is checked for undeclared
 * arguments.
 *
 * @packageDocumentation
 */

import { Framework } from '../framework/index.js';
import type { Argument, Attack } from '../framework/index.js';

/**
 * Error class for APX parsing errors.
 */
export class ApxParseError extends Error {
  /** 1-based line number of the offending line. */
  public readonly line: number;
  /** The offending line, without its line terminator. */
  public readonly text: string;

  /**
   * Creates a new ApxParseError.
   *
   * @param line - 1-based line number.
   * @param text - Content of the line.
   */
  constructor(line: number, text: string) {
    super(
      `Invalid statement on line ${String(line)}: '${text}'. ` +
        "Each argument must be defined as 'arg(name).' and each attack as 'att(name1,name2).'"
    );
    this.name = 'ApxParseError';
    this.line = line;
    this.text = text;
  }
}

/**
 * Arguments and attacks read from an APX document, in document order.
 */
export interface ApxDocument {
  readonly arguments: readonly Argument[];
  readonly attacks: readonly Attack[];
}

const ARGUMENT_STATEMENT = /^arg\((\w+)\)\.$/;
const ATTACK_STATEMENT = /^att\((\w+),(\w+)\)\.$/;

/**
 * Parses APX text into arguments and attacks.
 *
 * Blank lines and surrounding whitespace are ignored. Attacks are not
 * checked against the declared arguments here; {@link Framework.build} does
 * that.
 *
 * @param content - APX document text.
 * @returns The statements of the document.
 * @throws ApxParseError for a line that is neither an argument nor an attack.
 */
export function parseApx(content: string): ApxDocument {
  const args: Argument[] = [];
  const attacks: Attack[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '') {
      return;
    }

    const argument = ARGUMENT_STATEMENT.exec(line);
    if (argument?.[1] !== undefined) {
      args.push(argument[1]);
      return;
    }

    const attack = ATTACK_STATEMENT.exec(line);
    if (attack?.[1] !== undefined && attack[2] !== undefined) {
      attacks.push({ source: attack[1], target: attack[2] });
      return;
    }

    throw new ApxParseError(index + 1, raw);
  });

  return { arguments: args, attacks };
}

/**
 * Parses APX text and builds the framework it describes.
 *
 * @throws ApxParseError for malformed lines.
 * @throws MalformedFrameworkError if an attack names an undeclared argument.
 */
export function readFramework(content: string): Framework {
  return Framework.build(parseApx(content));
}
