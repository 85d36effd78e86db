import { parseArgs } from 'node:util';
import { getErrorMessage } from '../../core/errors.js';

export const DEFAULT_ENVIRONMENTS_FILE = 'environments.json';

export interface CliOptions {
  queryFile: string;
  environmentsFile: string;
  csvOutput: boolean;
  verbose: boolean;
  batch: boolean;
}

export type CliParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const USAGE = `Usage: fanout-sql <query-file> [options]

Runs a read-only SQL query against every database listed in the environments file.

Arguments:
  query-file                     Path to the SQL file to execute

Options:
  -e, --environments-file <path> Path to the environments JSON file (default: ${DEFAULT_ENVIRONMENTS_FILE})
  -c, --csv                      Output results in CSV format
  -v, --verbose                  Show detailed information
  -b, --batch                    Render results after every database has finished
  -h, --help                     Show this help
`;

const optionConfig = {
  'environments-file': { type: 'string', short: 'e', default: DEFAULT_ENVIRONMENTS_FILE },
  csv: { type: 'boolean', short: 'c', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
  batch: { type: 'boolean', short: 'b', default: false },
  help: { type: 'boolean', short: 'h', default: false }
} as const;

function parseWithConfig(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: optionConfig, allowPositionals: true, strict: true });
}

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  let parsed: ReturnType<typeof parseWithConfig>;
  try {
    parsed = parseWithConfig(argv);
  } catch (error) {
    return { kind: 'error', message: getErrorMessage(error) };
  }

  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length === 0) {
    return { kind: 'error', message: 'Missing required argument: query-file' };
  }
  if (positionals.length > 1) {
    return { kind: 'error', message: `Unexpected argument: ${positionals[1]}` };
  }

  const environmentsFile = values['environments-file'] ?? DEFAULT_ENVIRONMENTS_FILE;
  if (environmentsFile.trim().length === 0) {
    return { kind: 'error', message: 'Option --environments-file requires a path' };
  }

  return {
    kind: 'run',
    options: {
      queryFile: positionals[0] ?? '',
      environmentsFile,
      csvOutput: values.csv ?? false,
      verbose: values.verbose ?? false,
      batch: values.batch ?? false
    }
  };
}
