/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for server configuration.
 * Values given here take precedence over environment variables.
 */

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Interface the HTTP surface binds to */
  host?: string;

  /** HTTP port */
  port?: number;

  /** Client surface: HTTP endpoints or MCP over stdio */
  transport?: string;

  /** Default headless mode for new sessions */
  headless?: boolean;

  /** Path to Chrome executable */
  executablePath?: string;

  /** Chrome channel to use when no executable path is given */
  channel?: string;

  /** Upper bound on a single browser command (ms) */
  operationTimeoutMs?: number;

  /** Upper bound on an agent task (ms) */
  taskTimeoutMs?: number;

  /** Idle time after which a session is closed (ms, 0 disables) */
  sessionIdleTtlMs?: number;

  /** How long finished tasks stay queryable (ms) */
  taskRetentionMs?: number;

  /** Minimum log level */
  logLevel?: string;
}

type StringArg = 'host' | 'transport' | 'executablePath' | 'channel' | 'logLevel';
type NumberArg = 'port' | 'operationTimeoutMs' | 'taskTimeoutMs' | 'sessionIdleTtlMs' | 'taskRetentionMs';

const STRING_ARGS: readonly StringArg[] = ['host', 'transport', 'executablePath', 'channel', 'logLevel'];
const NUMBER_ARGS: readonly NumberArg[] = [
  'port',
  'operationTimeoutMs',
  'taskTimeoutMs',
  'sessionIdleTtlMs',
  'taskRetentionMs',
];

function isStringArg(name: string): name is StringArg {
  return STRING_ARGS.some((known) => known === name);
}

function isNumberArg(name: string): name is NumberArg {
  return NUMBER_ARGS.some((known) => known === name);
}

/**
 * Parse command-line arguments into ServerArgs.
 * Accepts `--name value` and `--name=value`. Malformed numbers are kept as NaN
 * so configuration validation reports them.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @returns Parsed server configuration
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('--')) {
      console.warn(`Warning: Unexpected argument "${arg}" - ignored`);
      continue;
    }

    const [name, inlineValue] = splitFlag(arg.slice(2));

    if (name === 'headless') {
      if (inlineValue === undefined || inlineValue === 'true' || inlineValue === '1') {
        args.headless = true;
      } else if (inlineValue === 'false' || inlineValue === '0') {
        args.headless = false;
      } else {
        console.warn(`Warning: Invalid value for --headless "${inlineValue}" - ignored`);
      }
      continue;
    }

    if (!isStringArg(name) && !isNumberArg(name)) {
      // Warn about unknown arguments to catch typos like --prot
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
      continue;
    }

    let value = inlineValue;
    if (value === undefined && i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[++i];
    }
    if (value === undefined) {
      console.warn(`Warning: Missing value for "${arg}" - ignored`);
      continue;
    }

    if (isNumberArg(name)) {
      args[name] = value.trim() === '' ? Number.NaN : Number(value);
    } else {
      args[name] = value;
    }
  }

  return args;
}

function splitFlag(flag: string): [string, string | undefined] {
  const eq = flag.indexOf('=');
  return eq === -1 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}
