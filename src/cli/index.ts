#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { RunCoordinator } from '../orchestrators/RunCoordinator';
import { TaskRunner } from '../runners/TaskRunner';
import { FileScanner } from '../scanners/FileScanner';
import { RetentionEvaluator } from '../evaluators/RetentionEvaluator';
import { createExecutionMode } from '../executors/ExecutionModes';
import { FileSystemClient } from '../clients/FileSystemClient';
import { Reporter } from '../reporters/Reporter';
import { DEFAULT_CONFIG_PATH, initConfig, loadConfig } from '../config';
import { ConfigError, RunStartError, errorMessage } from '../errors';
import { LogSweepConfig, RunReport } from '../types';
import { PatternMatcher, formatDuration, SizeCalculator } from '../utils';
import { EXIT_CANNOT_START, EXIT_SUCCESS, EXIT_TASK_FAILURES, exitCodeFor } from './exitCodes';

const VERSION = '1.0.0';

interface RunCommandOptions {
  config: string;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  ignoreMissing?: boolean;
  report?: string;
}

interface ConfigCheckOptions {
  config: string;
}

/**
 * CLI interface for logsweep
 */
class LogSweepCLI {
  private program: Command;
  private exitCode: number = EXIT_SUCCESS;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  /**
   * Setup CLI commands and options
   */
  private setupCommands(): void {
    this.program
      .name('logsweep')
      .description('Delete stale log files according to retention rules from a config file')
      .version(VERSION)
      .exitOverride();

    // Main cleanup command
    this.program
      .command('run', { isDefault: true })
      .description('Run every configured cleanup task (default command)')
      .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
      .option('-d, --dry-run', 'Simulate the cleanup without deleting any files')
      .option('-v, --verbose', 'Enable verbose logging')
      .option('-q, --quiet', 'Disable log output, print only the summary')
      .option('-i, --ignore-missing', 'Treat a missing task directory as a warning for every task')
      .option('--report <path>', 'Write the run report as JSON to this file')
      .action(async (options: RunCommandOptions) => {
        this.exitCode = await this.guard(() => this.executeRun(options, false));
      });

    // Preview command, always simulates
    this.program
      .command('check')
      .description('Preview what a run would delete without deleting anything')
      .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
      .option('-v, --verbose', 'Enable verbose logging')
      .option('-q, --quiet', 'Disable log output, print only the summary')
      .option('-i, --ignore-missing', 'Treat a missing task directory as a warning for every task')
      .option('--report <path>', 'Write the preview report as JSON to this file')
      .action(async (options: RunCommandOptions) => {
        this.exitCode = await this.guard(() => this.executeRun(options, true));
      });

    const config = this.program
      .command('config')
      .description('Create or validate the configuration file');

    config
      .command('init [path]')
      .description(`Create a template configuration file (default: ${DEFAULT_CONFIG_PATH})`)
      .action(async (configPath: string | undefined) => {
        this.exitCode = await this.guard(() => this.initConfig(configPath));
      });

    config
      .command('check')
      .description('Check that the configuration file exists and is valid')
      .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
      .action(async (options: ConfigCheckOptions) => {
        this.exitCode = await this.guard(() => this.checkConfig(options));
      });
  }

  /**
   * Execute a run, or a preview when simulate is forced
   */
  private async executeRun(options: RunCommandOptions, preview: boolean): Promise<number> {
    const config = await loadConfig(options.config);

    const reporter = new Reporter({
      ...config.logging,
      level: options.verbose ? 'debug' : config.logging.level,
      silent: options.quiet === true
    });
    const coordinator = this.createCoordinator(reporter);
    const tasks = options.ignoreMissing
      ? config.tasks.map(task => Object.freeze({ ...task, ignoreMissing: true }))
      : config.tasks;

    const report = preview
      ? await coordinator.preview(tasks)
      : await coordinator.run(tasks, config.dryRun || options.dryRun === true);

    console.log(reporter.generateSummary(report));

    if (options.report) {
      const savedTo = await reporter.saveReport(report, options.report);
      console.log(`📄 Report written to ${savedTo}`);
    }

    this.printHint(report);

    return exitCodeFor(report);
  }

  /**
   * Create the template configuration file
   */
  private async initConfig(configPath?: string): Promise<number> {
    const written = await initConfig(configPath ?? DEFAULT_CONFIG_PATH);
    console.log(`✅ Created template config file at ${written}`);
    return EXIT_SUCCESS;
  }

  /**
   * Validate configuration file and print the resolved tasks
   */
  private async checkConfig(options: ConfigCheckOptions): Promise<number> {
    let config: LogSweepConfig;

    try {
      config = await loadConfig(options.config);
    } catch (error) {
      console.log('Config check: [ERROR]');
      throw error;
    }

    console.log('Config check: [VALID]');
    this.displayConfig(config);
    return EXIT_SUCCESS;
  }

  /**
   * Create coordinator with all dependencies
   */
  private createCoordinator(reporter: Reporter): RunCoordinator {
    const fsClient = new FileSystemClient();
    const taskRunner = new TaskRunner(new FileScanner(fsClient), new RetentionEvaluator(), reporter);

    return new RunCoordinator(
      taskRunner,
      { simulate: createExecutionMode(true, fsClient), apply: createExecutionMode(false, fsClient, reporter) },
      reporter
    );
  }

  /**
   * Map errors that prevent a run from starting to exit codes
   */
  private async guard(action: () => Promise<number>): Promise<number> {
    try {
      return await action();
    } catch (error) {
      console.error(`❌ Error: ${errorMessage(error)}`);
      if (error instanceof ConfigError || error instanceof RunStartError) {
        return EXIT_CANNOT_START;
      }
      return EXIT_TASK_FAILURES;
    }
  }

  private displayConfig(config: LogSweepConfig): void {
    console.log(`  dryRun: ${config.dryRun}`);
    console.log(`  logging: level=${config.logging.level}${config.logging.file ? ` file=${config.logging.file}` : ''}`);
    console.log(`  tasks: ${config.tasks.length}`);

    config.tasks.forEach(task => {
      const policies = task.policies.map(policy => {
        switch (policy.kind) {
        case 'maxAge':
          return `maxAge=${formatDuration(policy.durationMs)}`;
        case 'maxCount':
          return `maxCount=${policy.count}`;
        case 'maxTotalSize':
        case 'maxFileSize':
          return `${policy.kind}=${SizeCalculator.formatBytes(policy.bytes)}`;
        }
      });

      const flags = [
        task.recursive ? 'recursive' : undefined,
        task.dryRun ? 'dry-run' : undefined,
        task.ignoreMissing ? 'ignore-missing' : undefined
      ].filter((flag): flag is string => flag !== undefined);

      console.log(`  - ${task.id}: ${task.directory} ${PatternMatcher.describe(task.pattern)} ${policies.join(' ')}` +
        (flags.length > 0 ? ` (${flags.join(', ')})` : ''));
    });
  }

  private printHint(report: RunReport): void {
    if (report.dryRun) {
      console.log('💡 This was a dry-run. No files were actually removed.');
    } else if (report.anyFailed) {
      console.log('⚠️ Cleanup finished with failures.');
    } else {
      console.log('✅ Cleanup completed successfully!');
    }
  }

  /**
   * Run the CLI and resolve with the process exit code
   */
  public async run(argv: string[] = process.argv): Promise<number> {
    this.exitCode = EXIT_SUCCESS;

    // A bare invocation never starts deleting files
    if (argv.length <= 2) {
      this.program.outputHelp();
      return EXIT_SUCCESS;
    }

    try {
      await this.program.parseAsync(argv);
    } catch (error) {
      // --help and --version also end up here with exit code 0
      if (error instanceof CommanderError) {
        return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CANNOT_START;
      }
      throw error;
    }

    return this.exitCode;
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new LogSweepCLI();
  cli.run()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('❌ CLI Error:', errorMessage(error));
      process.exitCode = EXIT_TASK_FAILURES;
    });
}

export { LogSweepCLI };
