/**
 * Command-line argument parsing for server/index.ts.
 */

export type CliCommand =
  | 'export'
  | 'export-file'
  | 'views'
  | 'db-views'
  | 'db-columns'
  | 'test-connection'
  | 'help';

export interface CliArgs {
  command: CliCommand;
  positionals: string[];
  configPath?: string;
  schema?: string;
  view?: string;
  template?: string;
  output?: string;
  includeHeaders?: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const COMMANDS: readonly CliCommand[] = [
  'export',
  'export-file',
  'views',
  'db-views',
  'db-columns',
  'test-connection',
  'help',
];

const VALUE_FLAGS = {
  '--config': 'configPath',
  '--schema': 'schema',
  '--view': 'view',
  '--template': 'template',
  '--output': 'output',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, flag);
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

export const USAGE = `Usage: tsx server/index.ts <command> [options]

Commands:
  export [VIEW ...]                         export configured views (all when none given)
  export-file --view V --template PATH      export one view into an explicit template
              [--output PATH]
  views                                     list configured views
  db-views                                  list views in the database schema
  db-columns VIEW                           list the columns of a database view
  test-connection                           connect once and report the server time

Options:
  --config PATH     configuration file (default: view_export.env)
  --schema NAME     database schema (default: DB_SCHEMA or public)
  --headers         write column names as a header row`;

export function parseCliArgs(argv: string[]): CliArgs {
  const [first, ...rest] = argv;
  if (!first || first === '--help' || first === '-h') {
    return { command: 'help', positionals: [] };
  }
  if (!isCommand(first)) {
    throw new CliUsageError(`Unknown command: ${first}`);
  }

  const args: CliArgs = { command: first, positionals: [] };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];

    if (token === '--headers') {
      args.includeHeaders = true;
      continue;
    }

    const eq = token.indexOf('=');
    const flag = eq > 0 ? token.slice(0, eq) : token;
    if (isValueFlag(flag)) {
      const value = eq > 0 ? token.slice(eq + 1) : rest[++i];
      if (value === undefined || value === '') {
        throw new CliUsageError(`Missing value for ${flag}`);
      }
      args[VALUE_FLAGS[flag]] = value;
      continue;
    }

    if (token.startsWith('--')) {
      throw new CliUsageError(`Unknown option: ${token}`);
    }
    args.positionals.push(token);
  }

  if (args.command === 'export-file' && (!args.view || !args.template)) {
    throw new CliUsageError('export-file needs --view and --template');
  }
  if (args.command === 'db-columns' && args.positionals.length !== 1) {
    throw new CliUsageError('db-columns needs exactly one view name');
  }

  return args;
}
