import { parseArgs } from 'util';
import { PruneConfig } from '../interfaces/PruneConfig';
import { LogLevel } from '../interfaces/Logger';
import { PruneError } from '../types/PruneError';
import { isLogLevel } from '../clients/Logger';

export class ConfigurationError extends PruneError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export type CommandLine = { kind: 'help' } | { kind: 'prune'; config: PruneConfig };

export const DEFAULT_TARSNAP_PATH = 'tarsnap';
export const DEFAULT_COMMAND_TIMEOUT_MS = 30 * 60 * 1000;

export const USAGE = `usage: tarsnap-prune [-h] [--keyfile PATH] [--dry-run] KEEP_SPEC

Prune old tarsnap backups

positional arguments:
  KEEP_SPEC       Specification for what archives to keep, e.g. 2d,5w,4mon
                  (units: s, min, h, d, w, mon, y)

options:
  -h, --help      show this help message and exit
  --keyfile PATH  Tarsnap key file to use (default: $TARSNAP_KEYFILE)
  -n, --dry-run   Only show what would be done, don't actually delete any archives

environment:
  TARSNAP_PATH        tarsnap executable (default: tarsnap)
  TARSNAP_TIMEOUT_MS  per-command timeout in milliseconds (default: 1800000)
  LOG_LEVEL           error, warn, info or debug (default: warn)`;

export class ConfigurationManager {
  /**
   * Build the run configuration from command-line arguments and environment
   */
  static loadConfiguration(argv: string[], env: NodeJS.ProcessEnv = process.env): CommandLine {
    const { values, positionals } = this.parseCommandLine(argv);

    if (values.help) {
      return { kind: 'help' };
    }

    if (positionals.length === 0) {
      throw new ConfigurationError('the following arguments are required: KEEP_SPEC', 'keepSpec');
    }
    if (positionals.length > 1) {
      throw new ConfigurationError(
        `unrecognized arguments: ${positionals.slice(1).join(' ')}`,
        'keepSpec'
      );
    }

    const config: PruneConfig = {
      keepSpec: positionals[0],
      dryRun: values['dry-run'] ?? false,
      tarsnapPath: env['TARSNAP_PATH'] || DEFAULT_TARSNAP_PATH,
      commandTimeoutMs: this.parseTimeout(env['TARSNAP_TIMEOUT_MS']),
      logLevel: this.parseLogLevel(env['LOG_LEVEL']),
    };

    const keyfile = values.keyfile ?? (env['TARSNAP_KEYFILE'] || undefined);
    if (keyfile !== undefined) {
      if (keyfile === '') {
        throw new ConfigurationError('--keyfile must not be empty', 'keyfile');
      }
      config.keyfile = keyfile;
    }

    return { kind: 'prune', config };
  }

  private static parseCommandLine(argv: string[]) {
    try {
      return parseArgs({
        args: argv,
        options: {
          keyfile: { type: 'string' },
          'dry-run': { type: 'boolean', short: 'n', default: false },
          help: { type: 'boolean', short: 'h', default: false },
        },
        allowPositionals: true,
        strict: true,
      });
    } catch (error) {
      throw new ConfigurationError(error instanceof Error ? error.message : String(error));
    }
  }

  private static parseTimeout(value: string | undefined): number {
    if (!value) {
      return DEFAULT_COMMAND_TIMEOUT_MS;
    }

    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed) || parsed <= 0) {
      throw new ConfigurationError(
        'TARSNAP_TIMEOUT_MS must be a positive integer',
        'TARSNAP_TIMEOUT_MS'
      );
    }
    return parsed;
  }

  private static parseLogLevel(value: string | undefined): LogLevel {
    if (!value) {
      return LogLevel.WARN;
    }

    const level = value.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }

  static sanitizeForLogging(config: PruneConfig): Record<string, unknown> {
    return {
      ...config,
      ...(config.keyfile !== undefined && { keyfile: '[REDACTED]' }),
    };
  }
}
