/**
 * Argument parsing for the manage-index script
 */

import { LogLevel, toLogFormat, type LogFormat } from '@rulebook-kb/lib';

// ============================================================================
// Types
// ============================================================================

export const COMMANDS = ['rebuild-index', 'update-index', 'validate-index', 'query', 'status'] as const;

export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command | null;
  /** --doc=ID */
  documentId?: string;
  /** Positional text of the query command */
  query?: string;
  /** --ceiling=N */
  ceiling?: number;
  /** --data-dir=PATH */
  dataDir?: string;
  verbose: boolean;
  quiet: boolean;
  logFormat: LogFormat;
  help: boolean;
  /** Usage problems found while parsing */
  errors: string[];
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

// ============================================================================
// Argument Parsing
// ============================================================================

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    verbose: false,
    quiet: false,
    logFormat: 'pretty',
    help: false,
    errors: [],
  };
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('--doc=')) {
      result.documentId = arg.slice(6);
    } else if (arg.startsWith('--data-dir=')) {
      result.dataDir = arg.slice(11);
    } else if (arg.startsWith('--log-format=')) {
      const value = arg.slice(13);
      result.logFormat = toLogFormat(value, result.logFormat);
      if (result.logFormat !== value) {
        result.errors.push(`Unknown log format "${value}" (expected text, json or pretty)`);
      }
    } else if (arg.startsWith('--ceiling=')) {
      const ceiling = parseInt(arg.slice(10), 10);
      if (Number.isNaN(ceiling) || ceiling <= 0) {
        result.errors.push(`--ceiling must be a positive integer, got "${arg.slice(10)}"`);
      } else {
        result.ceiling = ceiling;
      }
    } else if (arg.startsWith('--')) {
      result.errors.push(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [command, ...rest] = positional;
  if (command !== undefined) {
    if (isCommand(command)) {
      result.command = command;
    } else {
      result.errors.push(`Unknown command "${command}"`);
    }
  }

  if (result.command === 'query') {
    const query = rest.join(' ').trim();
    if (query) {
      result.query = query;
    } else {
      result.errors.push('The query command needs the query text');
    }
  } else if (rest.length > 0) {
    result.errors.push(`Unexpected arguments: ${rest.join(' ')}`);
  }

  if (!result.help && result.command === null && result.errors.length === 0) {
    result.errors.push('No command given');
  }

  return result;
}

export function resolveLogLevel(args: Pick<ParsedArgs, 'verbose' | 'quiet'>): LogLevel {
  if (args.quiet) return LogLevel.ERROR;
  if (args.verbose) return LogLevel.DEBUG;
  return LogLevel.INFO;
}

export const HELP_TEXT = `
Index Management Script

Usage:
  npm run manage-index -w @rulebook-kb/scripts -- <command> [options]

Commands:
  rebuild-index         Rebuild every catalogued document (or one with --doc)
  update-index          Rebuild only documents whose source or version changed
  validate-index        Check indices against each other and the chunk files
  query "<text>"        Print the retrieval result for a query
  status                List catalogued documents and their indexed versions

Options:
  --doc=ID              Restrict rebuild-index / validate-index to one document
  --ceiling=N           Context token ceiling for query (default: KB_CONTEXT_TOKEN_CEILING)
  --data-dir=PATH       Data directory (default: KB_DATA_DIR or ./data)
  --verbose             Show detailed logging (DEBUG level)
  --quiet               Minimal output (ERROR level only)
  --log-format=FMT      Log format: text, json, pretty (default: pretty)
  -h, --help            Show this help message

Examples:
  npm run manage-index -w @rulebook-kb/scripts -- rebuild-index --doc=rfebm-2024
  npm run manage-index -w @rulebook-kb/scripts -- query "Art. 8 sanciones" --ceiling=8000
`;
