/**
 * Option parsing shared by the `run` and `scenario` commands.
 */

/**
 * Thrown for malformed command-line options.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options accepted by the session commands.
 */
export interface SessionArgs {
  /** Arguments that are not options, in order. */
  positional: string[];
  /** `--config <path>` */
  configPath?: string;
  /** `--log <path>` */
  logPath?: string;
  /** `--report <path>`; `.yaml` or `.yml` selects YAML. */
  reportPath?: string;
  /** `--max-turns <n>` */
  maxTurns?: number;
}

function parsePositiveInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Parses session command options.
 *
 * @throws CliUsageError on an unknown option or a missing or invalid value.
 */
export function parseSessionArgs(args: readonly string[]): SessionArgs {
  const result: SessionArgs = { positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      result.positional.push(arg);
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`${arg} requires a value`);
    }
    i++;

    switch (arg) {
      case '--config':
        result.configPath = value;
        break;
      case '--log':
        result.logPath = value;
        break;
      case '--report':
        result.reportPath = value;
        break;
      case '--max-turns':
        result.maxTurns = parsePositiveInteger(arg, value);
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return result;
}
