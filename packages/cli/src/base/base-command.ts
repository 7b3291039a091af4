/**
 * Base Command Class for the forkflow CLI
 *
 * Provides common output and error handling for every command.
 */

import { Command } from 'commander';
import { Errors } from '@forkflow/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> implements ICommand {
  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands.
   * SyncError subclasses carry the commands that recover from them.
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;
    const remediation = error instanceof Errors.SyncError ? error.remediation : [];

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        remediation,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (remediation.length > 0) {
        console.error('To recover:');
        for (const command of remediation) {
          console.error(`  $ ${command}`);
        }
      }
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently.
   * `text` is what a human reads; `data` is what --json prints.
   */
  protected handleSuccess<T>(data: T, options: TOptions, text?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (text && !isQuiet) {
      console.log(text);
    }
  }

  protected errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  protected toError(error: unknown): Error | undefined {
    return error instanceof Error ? error : undefined;
  }
}
