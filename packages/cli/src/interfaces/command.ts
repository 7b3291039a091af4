/**
 * Standard Command Interface for the forkflow CLI
 *
 * Every command implements this interface so that commands can be
 * registered uniformly and tested with a mocked dependency service.
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Options of commands that ask the operator for confirmation
 */
export interface ConfirmableOptions extends BaseCommandOptions {
  /** Skip confirmation prompts */
  yes?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}
