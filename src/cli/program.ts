/**
 * Command-line front end: ranks stdin against a query and prints the result.
 *
 * Exit codes:
 * - 0: at least one line printed (or help/version shown)
 * - 1: nothing matched the query
 * - 2: no input on stdin
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { env } from '../config';
import type { ConsecutiveRule, RankedCandidate } from '../matching';
import { PickerSession, readCandidates } from '../picker';
import type { CandidateSource } from '../picker';
import { logger, PickerError } from '../utils';

export const VERSION = '0.1.0';

const CONSECUTIVE_RULES: readonly ConsecutiveRule[] = ['previous-characters', 'adjacent-run'];

export interface PickerIO {
  input: CandidateSource;
  output: NodeJS.WritableStream;
  error: NodeJS.WritableStream;
}

export interface PickerCommandOptions {
  limit?: number;
  select?: number;
  scores?: boolean;
  consecutiveRule: ConsecutiveRule;
}

function parseInteger(value: string, minimum: number, label: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < minimum) {
    throw new InvalidArgumentError(`${label} must be an integer of at least ${minimum}.`);
  }
  return parsed;
}

const parseLimit = (value: string): number => parseInteger(value, 1, 'Limit');
const parseIndex = (value: string): number => parseInteger(value, 0, 'Index');

const formatLine = (entry: RankedCandidate, withScore: boolean): string =>
  withScore ? `${entry.score}\t${entry.candidate}\n` : `${entry.candidate}\n`;

/**
 * Reads candidates, ranks them and writes the chosen lines.
 *
 * @returns Process exit code
 */
export async function runPicker(
  query: string,
  options: PickerCommandOptions,
  io: PickerIO
): Promise<number> {
  const candidates = await readCandidates(io.input);
  logger.info(`Read ${candidates.length} candidate lines`);

  const session = new PickerSession(candidates, { consecutiveRule: options.consecutiveRule });
  session.setQuery(query);

  const results = session.results;
  if (results.length === 0) {
    logger.debug(`No candidate matched "${query}"`);
    return 1;
  }

  let chosen: readonly RankedCandidate[];
  if (options.select !== undefined) {
    // Selection starts on the first row; move down, stopping at the last one
    const index = session.moveSelection(options.select);
    if (index === null) {
      throw PickerError.internal('Selection is empty for a non-empty result list');
    }
    chosen = [results[index]];
  } else {
    chosen = options.limit === undefined ? results : results.slice(0, options.limit);
  }

  for (const entry of chosen) {
    io.output.write(formatLine(entry, options.scores === true));
  }

  return 0;
}

/**
 * Builds the `line-picker` command. `onExit` receives the picker's exit code.
 */
export function createProgram(io: PickerIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('line-picker')
    .description('Read lines from stdin and print them ranked by a fuzzy query')
    .version(VERSION, '-v, --version', 'Show version and quit')
    .helpOption('-h, --help', 'Show this help and quit')
    .argument('[query]', 'fuzzy query; omit to keep the input order', '')
    .option('-l, --limit <n>', 'print at most n lines', parseLimit)
    .addOption(
      new Option('-s, --select <index>', 'print only the ranked line at index')
        .argParser(parseIndex)
        .conflicts('limit')
    )
    .option('--scores', 'prefix each line with its score and a tab')
    .addOption(
      new Option('--consecutive-rule <rule>', 'how the consecutive bonus is awarded')
        .choices(CONSECUTIVE_RULES)
        .default(env.PICKER_CONSECUTIVE_RULE)
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.output.write(str),
      writeErr: (str) => io.error.write(str),
    })
    .action(async (query: string, options: PickerCommandOptions) => {
      onExit(await runPicker(query, options, io));
    });

  return program;
}

/**
 * Parses `argv` (without the node and script entries) and runs the picker.
 * Operational errors become a message on `io.error` and their exit code.
 */
export async function runCli(argv: readonly string[], io: PickerIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    if (error instanceof PickerError && error.isOperational) {
      logger.debug(`Operational error: ${error.message}`);
      io.error.write(`Error: ${error.message}\n`);
      if (error.hint) {
        io.error.write(`${error.hint}\n`);
      }
      return error.exitCode;
    }

    throw error;
  }

  return exitCode;
}
