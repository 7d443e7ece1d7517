import { spawn } from 'child_process';
import {
  TarsnapClient as ITarsnapClient,
  TarsnapClientConfig,
} from '../interfaces/TarsnapClient';
import { Logger } from '../interfaces/Logger';
import { PruneError } from '../types/PruneError';

export class TarsnapCommandError extends PruneError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number,
    public readonly stderr: string = '',
    cause?: Error
  ) {
    super(message, 'tarsnap', cause);
    this.name = 'TarsnapCommandError';
  }
}

interface CommandOptions {
  env?: NodeJS.ProcessEnv;
}

const KILL_GRACE_MS = 10_000;

/**
 * Copy of `args` with the key file path hidden, for log lines
 */
export function maskKeyfileArgs(args: readonly string[]): string[] {
  return args.map((arg, index) => (index > 0 && args[index - 1] === '--keyfile' ? '[REDACTED]' : arg));
}

/**
 * Thin wrapper around the tarsnap executable
 */
export class TarsnapClient implements ITarsnapClient {
  private config: TarsnapClientConfig;
  private logger: Logger;

  constructor(config: TarsnapClientConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * List archives with creation times, rendered in UTC
   */
  async listArchives(): Promise<string> {
    return this.run(['--list-archives', '-v'], {
      env: { ...process.env, TZ: 'UTC' },
    });
  }

  async deleteArchives(names: readonly string[]): Promise<void> {
    if (names.length === 0) {
      return;
    }

    const args = ['-d'];
    for (const name of names) {
      args.push('-f', name);
    }
    await this.run(args);
  }

  private baseArgs(): string[] {
    return this.config.keyfile !== undefined ? ['--keyfile', this.config.keyfile] : [];
  }

  private run(args: string[], options: CommandOptions = {}): Promise<string> {
    const fullArgs = [...this.baseArgs(), ...args];
    const command = [this.config.tarsnapPath, ...fullArgs].join(' ');
    const loggedCommand = [this.config.tarsnapPath, ...maskKeyfileArgs(fullArgs)].join(' ');

    return new Promise((resolve, reject) => {
      this.logger.debug('Executing tarsnap command', { command: loggedCommand });

      const child = spawn(this.config.tarsnapPath, fullArgs, {
        stdio: ['ignore', 'pipe', 'pipe'],
        env: options.env ?? process.env,
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (error: TarsnapCommandError | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        if (error) {
          this.logger.logCommandError(loggedCommand, error, { exitCode: error.exitCode });
          reject(error);
        } else {
          resolve(stdout);
        }
      };

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        stderr += chunk;
        this.logger.warn('tarsnap stderr', { command: loggedCommand, output: chunk.trim() });
      });

      child.on('close', code => {
        if (code === 0) {
          finish(null);
          return;
        }

        const exitCode = code ?? -1;
        finish(
          new TarsnapCommandError(
            `Command '${command}' failed with exit status ${exitCode}`,
            command,
            exitCode,
            stderr
          )
        );
      });

      child.on('error', error => {
        finish(
          new TarsnapCommandError(this.describeSpawnError(command, error), command, undefined, stderr, error)
        );
      });

      const timeout = setTimeout(() => {
        this.logger.warn('tarsnap timeout reached, terminating process', { command: loggedCommand });
        child.kill('SIGTERM');

        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            this.logger.warn('Force killing tarsnap process', { command: loggedCommand });
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS).unref();

        finish(
          new TarsnapCommandError(
            `Command '${command}' timed out after ${this.config.commandTimeoutMs}ms`,
            command,
            undefined,
            stderr
          )
        );
      }, this.config.commandTimeoutMs);
      timeout.unref();
    });
  }

  private describeSpawnError(command: string, error: NodeJS.ErrnoException): string {
    if (error.code === 'ENOENT') {
      return `Command '${command}' failed: ${this.config.tarsnapPath} not found. Please ensure tarsnap is installed.`;
    }

    if (error.code === 'EACCES') {
      return `Command '${command}' failed: permission denied executing ${this.config.tarsnapPath}.`;
    }

    return `Command '${command}' failed: ${error.message}`;
  }
}
