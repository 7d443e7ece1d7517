#!/usr/bin/env node
import { ConfigurationManager, USAGE } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { PruneManager } from './clients/PruneManager';
import { PruneReporter, LineWriter } from './clients/PruneReporter';
import { RetentionSelector } from './clients/RetentionSelector';
import { TarsnapClient } from './clients/TarsnapClient';
import { TarsnapClient as ITarsnapClient } from './interfaces/TarsnapClient';
import { PruneConfig } from './interfaces/PruneConfig';
import { LogLevel } from './interfaces/Logger';
import { PruneError } from './types/PruneError';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface ApplicationDependencies {
  logger?: Logger;
  write?: LineWriter;
  createTarsnapClient?: (config: PruneConfig, logger: Logger) => ITarsnapClient;
}

/**
 * Wires configuration, tarsnap and the retention engine into one run
 */
class TarsnapPruneApplication {
  private argv: string[];
  private env: NodeJS.ProcessEnv;
  private logger: Logger;
  private reporter: PruneReporter;
  private createTarsnapClient: (config: PruneConfig, logger: Logger) => ITarsnapClient;
  private loggerInjected: boolean;

  constructor(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
    dependencies: ApplicationDependencies = {}
  ) {
    this.argv = argv;
    this.env = env;
    // Provisional logger until the configuration, LOG_LEVEL included, has been validated
    this.logger = dependencies.logger ?? new Logger(LogLevel.WARN);
    this.loggerInjected = dependencies.logger !== undefined;
    this.reporter = new PruneReporter(dependencies.write);
    this.createTarsnapClient =
      dependencies.createTarsnapClient ??
      ((config, logger) => new TarsnapClient(config, logger));
  }

  /**
   * Execute one prune run and resolve to the process exit code
   */
  async run(): Promise<number> {
    try {
      const commandLine = ConfigurationManager.loadConfiguration(this.argv, this.env);
      if (commandLine.kind === 'help') {
        this.reporter.reportMessage(USAGE);
        return EXIT_SUCCESS;
      }

      const { config } = commandLine;
      if (!this.loggerInjected) {
        this.logger = new Logger(config.logLevel);
      }
      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      const pruneManager = new PruneManager(
        this.createTarsnapClient(config, this.logger),
        new RetentionSelector(),
        this.reporter,
        this.logger,
        config
      );
      await pruneManager.executePrune();
      return EXIT_SUCCESS;
    } catch (error) {
      if (error instanceof PruneError) {
        this.logger.error('Prune run aborted', error, { failedOperation: error.operation });
        this.reporter.reportMessage(error.message);
        return EXIT_FAILURE;
      }

      const unexpected = error instanceof Error ? error : new Error(String(error));
      this.logger.error('Unexpected error during prune run', unexpected);
      this.reporter.reportMessage(`Unexpected error: ${unexpected.message}`);
      return EXIT_FAILURE;
    }
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  const app = new TarsnapPruneApplication();
  process.exitCode = await app.run();
}

// Export for testing
export { TarsnapPruneApplication, main };

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error running tarsnap-prune:', error);
    process.exit(EXIT_FAILURE);
  });
}
