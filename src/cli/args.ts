/**
 * Command-line option parsing for the solve command.
 *
 * @packageDocumentation
 */

/**
 * Error class for invalid command-line usage.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options of a solve invocation.
 */
export interface SolveOptions {
  /** Path to the APX file. */
  readonly file: string;
  /** Raw problem code, validated later. */
  readonly problem: string;
  /** Query arguments, in the order given. */
  readonly arguments: readonly string[];
}

/**
 * Valid query argument names: letters, digits and underscores, except the
 * reserved words `arg` and `att`.
 */
const ARGUMENT_NAME_PATTERN = /^(?!att$|arg$)\w+$/;

/**
 * Splits and validates a comma-separated argument list.
 *
 * An empty string is the empty set.
 *
 * @param value - Raw value of the `--arguments` option.
 * @returns The argument names.
 * @throws CliUsageError if a name is invalid.
 */
export function parseArgumentList(value: string): string[] {
  if (value === '') {
    return [];
  }
  const names = value.split(',');
  const invalid = names.filter((name) => !ARGUMENT_NAME_PATTERN.test(name));
  if (invalid.length > 0) {
    throw new CliUsageError(
      `Unaccepted argument(s): ${invalid.map((name) => `'${name}'`).join(', ')}. ` +
        'The name of an argument can be any sequence of letters (upper case or lower case), ' +
        "numbers, or the underscore symbol _, except the words 'arg' and 'att'."
    );
  }
  return names;
}

type OptionName = 'file' | 'problem' | 'arguments';

const OPTION_FLAGS: ReadonlyMap<string, OptionName> = new Map<string, OptionName>([
  ['-f', 'file'],
  ['--file', 'file'],
  ['-p', 'problem'],
  ['--problem', 'problem'],
  ['-a', 'arguments'],
  ['--arguments', 'arguments'],
]);

/**
 * Parses solve options from command-line arguments.
 *
 * Accepts `-f FILE`, `-p PROBLEM` and `-a ARG1,ARG2,...` (long forms
 * `--file`, `--problem`, `--arguments`, also as `--name=value`). `-a`
 * without a value, or left out, means the empty set.
 *
 * @param argv - Arguments after the executable and script path.
 * @returns The parsed options.
 * @throws CliUsageError for unknown options, missing values or invalid names.
 *
 * @example
 * ```typescript
 * parseSolveArgs(['-f', 'af.apx', '-p', 'DC-CO', '-a', 'a']);
 * // { file: 'af.apx', problem: 'DC-CO', arguments: ['a'] }
 * ```
 */
export function parseSolveArgs(argv: readonly string[]): SolveOptions {
  const values = new Map<OptionName, string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const option = OPTION_FLAGS.get(flag);

    if (option === undefined) {
      throw new CliUsageError(`Unknown option: ${token}`);
    }
    if (values.has(option)) {
      throw new CliUsageError(`Option specified more than once: --${option}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = token.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !OPTION_FLAGS.has(next.split('=')[0] ?? next)) {
        value = next;
        i++;
      }
    }

    if (value === undefined) {
      if (option !== 'arguments') {
        throw new CliUsageError(`Missing value for --${option}`);
      }
      value = '';
    }
    values.set(option, value);
  }

  const file = values.get('file');
  if (file === undefined || file === '') {
    throw new CliUsageError('Missing required option --file');
  }
  const problem = values.get('problem');
  if (problem === undefined || problem === '') {
    throw new CliUsageError('Missing required option --problem');
  }

  return { file, problem, arguments: parseArgumentList(values.get('arguments') ?? '') };
}
