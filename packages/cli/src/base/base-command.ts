/**
 * Base Command Class for the revq CLI
 *
 * Shared output handling and access to the review service.
 */

import { Command } from 'commander';
import { toErrorMessage } from '@revq/core';
import type { ReviewService } from '@revq/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Adds --json, --verbose and --quiet to a command
 */
export function addOutputOptions(command: Command): Command {
  return command
    .option('--json', 'Output in JSON format')
    .option('-v, --verbose', 'Show detailed output')
    .option('-q, --quiet', 'Suppress output except errors');
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  abstract register(program: Command): void;

  /**
   * Runs `fn` against the configured service and releases it afterwards
   */
  protected async withService<T>(options: TOptions, fn: (service: ReviewService) => Promise<T>): Promise<T> {
    const service = await this.dependencyService.getService(options);
    try {
      return await fn(service);
    } finally {
      await this.dependencyService.closeService();
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(error: unknown, options: TOptions, exitCode: number = 1): void {
    const message = typeof error === 'string' ? error : toErrorMessage(error);

    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      console.error(message.startsWith('❌') ? message : `❌ ${message}`);
      if (options.verbose && error instanceof Error && error.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, lines: string[]): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }
    if (!options.quiet) {
      lines.forEach((line) => console.log(line));
    }
  }

  /**
   * Progress chatter, silent under --json and --quiet
   */
  protected info(message: string, options: TOptions): void {
    if (!options.json && !options.quiet) {
      console.log(message);
    }
  }
}
