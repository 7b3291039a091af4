import { Command } from 'commander';
import { Sync } from '@forkflow/core';
import type { Config } from '@forkflow/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface SyncOptions extends BaseCommandOptions {
  auto?: boolean;
}

/**
 * SyncCommand - CLI front of the sync pipeline
 *
 * The pipeline never throws for stage failures; a halted session is
 * printed with its recovery commands and exits 1.
 */
export class SyncCommand extends BaseCommand<SyncOptions> {

  override register(program: Command): void {
    program
      .command('sync')
      .description('Fetch upstream, update the mirror, merge into integration, test and promote to production')
      .option('--auto', 'Run without prompts; production is updated only when the test gate allows it')
      .action(async (_options: SyncOptions, command: Command) => {
        await this.execute(command.optsWithGlobals());
      });
  }

  async execute(options: SyncOptions): Promise<void> {
    try {
      const pipeline = await this.dependencyService.getSyncPipeline();
      const config = await this.dependencyService.getConfig();
      const session = await pipeline.run(options.auto ? 'auto' : 'manual');
      reportSession(session, config.branches, options);
    } catch (error) {
      this.handleError(`Sync failed: ${this.errorMessage(error)}`, options, this.toError(error));
    }
  }
}

/**
 * Prints a finished session and exits 1 when it halted.
 */
export function reportSession(
  session: Sync.SyncSession,
  branches: Config.ForkflowConfig['branches'],
  options: BaseCommandOptions
): void {
  const exitCode = Sync.sessionExitCode(session);

  if (options.json) {
    console.log(JSON.stringify({
      success: exitCode === 0,
      data: session,
      exitCode
    }, null, 2));
  } else if (!options.quiet || exitCode !== 0) {
    console.log(Sync.formatSessionSummary(session, branches));
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}
