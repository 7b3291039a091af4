import { Command } from 'commander';
import type { HealthCheck } from '@forkflow/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

const STATUS_ICONS: Record<HealthCheck.CheckStatus, string> = {
  pass: '✓',
  warn: '⚠',
  fail: '✗',
};

const CATEGORY_TITLES: Record<HealthCheck.CheckCategory, string> = {
  remotes: 'Checking remotes...',
  branches: 'Checking branches...',
  sync: 'Checking sync status...',
  backups: 'Checking backup tags...',
  'protected-paths': 'Checking protected paths...',
  changelog: 'Checking sync history...',
  'working-tree': 'Checking working tree...',
  session: 'Checking session lease...',
};

/**
 * Renders the report grouped by category, in check order.
 */
export function formatHealthReport(report: HealthCheck.HealthReport): string {
  const lines = ['=== Fork Health Check ==='];
  let category: HealthCheck.CheckCategory | null = null;

  for (const check of report.checks) {
    if (check.category !== category) {
      category = check.category;
      lines.push('', CATEGORY_TITLES[category]);
    }
    lines.push(`  ${STATUS_ICONS[check.status]} ${check.message}`);
  }

  lines.push('', '=== Summary ===');
  if (report.errors === 0 && report.warnings === 0) {
    lines.push('✓ All checks passed!');
  } else if (report.errors === 0) {
    lines.push(`⚠ ${report.warnings} warning(s) found`);
  } else {
    lines.push(`✗ ${report.errors} error(s) and ${report.warnings} warning(s) found`);
  }
  return lines.join('\n');
}

/**
 * HealthCheckCommand - read-only diagnosis of the fork; exits 1 when any check fails.
 */
export class HealthCheckCommand extends BaseCommand {

  override register(program: Command): void {
    program
      .command('health-check')
      .description('Check remotes, branches, sync state, backups and protected paths without changing anything')
      .action(async (_options: BaseCommandOptions, command: Command) => {
        await this.execute(command.optsWithGlobals());
      });
  }

  async execute(options: BaseCommandOptions): Promise<void> {
    let report: HealthCheck.HealthReport;
    try {
      const checker = await this.dependencyService.getHealthChecker();
      report = await checker.run();
    } catch (error) {
      this.handleError(`Health check failed: ${this.errorMessage(error)}`, options, this.toError(error));
      return;
    }

    if (options.json) {
      console.log(JSON.stringify({
        success: report.healthy,
        data: report
      }, null, 2));
    } else if (!options.quiet || !report.healthy) {
      console.log(formatHealthReport(report));
    }

    if (!report.healthy) {
      process.exit(1);
    }
  }
}
