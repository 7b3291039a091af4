/**
 * PostPromotionNotifier - rebuild, verify, restart and announce after a promotion
 *
 * Nothing here reverts a promotion. A failed build leaves the previous
 * artifact running and is reported as a BuildVerificationError warning.
 */

import { setTimeout as delay } from 'timers/promises';
import type { IGitModule } from '../git/git_module';
import type { CommitInfo, ExecCommand } from '../git/types';
import type { CommandSpec, ForkflowConfig } from '../config_manager/config_manager.types';
import type { Workspace } from '../workspace';
import { BuildVerificationError } from '../errors';
import { appendToLogFile, createLogger } from '../logger/logger';
import { formatCommand } from '../test_gate';

const logger = createLogger('[Deploy] ');

export type StepStatus = 'ok' | 'failed' | 'skipped';

export type ServiceStatus = 'healthy' | 'unhealthy' | 'restarted' | 'restart-failed' | 'not-running' | 'skipped';

export type DeployReport = {
  install: StepStatus;
  build: StepStatus;
  marker: 'present' | 'missing' | 'skipped';
  service: ServiceStatus;
  buildVerification: BuildVerificationError | null;
  warnings: string[];
};

export type NotificationInput = {
  newCommitCount: number;
  date: string;
  /** Upstream commits merged by this run: mirror tip before..after */
  range: { from: string; to: string };
  deploy: DeployReport | null;
};

export type NotificationResult = {
  status: 'sent' | 'failed' | 'skipped';
  message: string;
  warning: string | null;
};

export type PostPromotionNotifierDependencies = {
  git: IGitModule;
  workspace: Workspace;
  execCommand: ExecCommand;
  config: Pick<ForkflowConfig, 'branches' | 'build' | 'service' | 'notification'>;
  sleep?: (ms: number) => Promise<void>;
};

const NOTABLE = /feat|fix|breaking/i;

/**
 * Replaces `{name}` placeholders in every argument.
 */
export function expandCommand(spec: CommandSpec, values: Record<string, string>): CommandSpec {
  return {
    command: spec.command,
    args: spec.args.map((arg) =>
      arg.replace(/\{(\w+)\}/g, (placeholder: string, name: string) => values[name] ?? placeholder)
    ),
  };
}

export function selectNotableCommits(commits: CommitInfo[], max: number): string[] {
  const notable = commits.filter((commit) => NOTABLE.test(commit.message));
  return (notable.length > 0 ? notable : commits).slice(0, max).map((commit) => commit.message);
}

export class PostPromotionNotifier {
  private readonly git: IGitModule;
  private readonly workspace: Workspace;
  private readonly execCommand: ExecCommand;
  private readonly config: Pick<ForkflowConfig, 'branches' | 'build' | 'service' | 'notification'>;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(dependencies: PostPromotionNotifierDependencies) {
    this.git = dependencies.git;
    this.workspace = dependencies.workspace;
    this.execCommand = dependencies.execCommand;
    this.config = dependencies.config;
    this.sleep = dependencies.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Installs, builds, checks the marker and restarts the service from production.
   */
  async deploy(): Promise<DeployReport> {
    const { build } = this.config;
    const warnings: string[] = [];

    await this.git.checkoutBranch(this.config.branches.production);

    const install = await this.install();
    if (install === 'failed') {
      warnings.push('Dependency installation failed; building with the installed dependencies');
    }

    let buildStatus: StepStatus = 'skipped';
    if (build.buildCommand) {
      logger.info(`Building from ${this.config.branches.production}...`);
      buildStatus = (await this.runStep(build.buildCommand)) ? 'ok' : 'failed';
    }

    if (buildStatus === 'failed') {
      const error = new BuildVerificationError('Build failed! The service keeps running the previous build.', [
        build.buildCommand ? formatCommand(build.buildCommand) : 'rebuild manually',
      ]);
      logger.error(`✗ ${error.message}`);
      warnings.push(error.message);
      return { install, build: buildStatus, marker: 'skipped', service: 'skipped', buildVerification: error, warnings };
    }
    if (buildStatus === 'ok') {
      logger.info(`✓ ${build.outputDir} rebuilt`);
    }

    let buildVerification: BuildVerificationError | null = null;
    const marker = await this.verifyMarker();
    if (marker === 'missing') {
      buildVerification = new BuildVerificationError(
        `Local modifications (${build.marker}) NOT found in ${build.outputDir}; the build may have regressed`,
        build.markerSources.map((source) => `check for merge damage in ${source}`)
      );
      logger.error(`✗ ${buildVerification.message}`);
      warnings.push(buildVerification.message);
    }

    const service = await this.restartService();
    if (service === 'unhealthy' || service === 'restart-failed') {
      warnings.push(
        service === 'unhealthy'
          ? 'Service may still be starting up; check its health manually'
          : 'Service restart failed; restart it manually'
      );
    }

    return { install, build: buildStatus, marker, service, buildVerification, warnings };
  }

  async verifyMarker(): Promise<'present' | 'missing' | 'skipped'> {
    const { marker, outputDir } = this.config.build;
    if (!marker) {
      return 'skipped';
    }
    for (const file of await this.workspace.list([`${outputDir}/**`])) {
      if ((await this.workspace.read(file)).includes(marker)) {
        logger.info(`✓ Local modifications (${marker}) verified in ${outputDir}`);
        return 'present';
      }
    }
    return 'missing';
  }

  /**
   * Restarts the service when its status command reports it running, then
   * polls the health command a bounded number of times.
   */
  async restartService(): Promise<ServiceStatus> {
    const { service, notification } = this.config;
    const vars = { profile: notification.profile };
    if (!service.statusCommand || !service.restartCommand) {
      return 'skipped';
    }

    const status = await this.exec(expandCommand(service.statusCommand, vars));
    if (status.exitCode !== 0) {
      logger.info(`No running service found for profile ${notification.profile}. Skipping restart.`);
      return 'not-running';
    }

    logger.info(`Restarting service for profile ${notification.profile}...`);
    const restart = await this.exec(expandCommand(service.restartCommand, vars));
    if (restart.exitCode !== 0) {
      logger.warn(`Service restart exited with ${restart.exitCode}`);
      return 'restart-failed';
    }
    if (!service.healthCommand) {
      return 'restarted';
    }

    const health = expandCommand(service.healthCommand, vars);
    for (let attempt = 1; attempt <= service.healthAttempts; attempt++) {
      if ((await this.exec(health)).exitCode === 0) {
        logger.info('✓ Service restarted and healthy');
        return 'healthy';
      }
      if (attempt < service.healthAttempts) {
        await this.sleep(service.healthIntervalMs);
      }
    }
    logger.warn(`Service not healthy after ${service.healthAttempts} attempts`);
    return 'unhealthy';
  }

  async buildMessage(input: NotificationInput): Promise<string> {
    const commits = await this.git.getCommitHistoryRange(input.range.from, input.range.to);
    const notable = selectNotableCommits(commits, this.config.notification.maxNotableCommits);
    const lines = [
      'Fork updated',
      '',
      `Version: ${await this.readVersion()}`,
      `Upstream commits merged: ${input.newCommitCount}`,
      `Date: ${input.date}`,
      '',
      'Notable changes:',
      ...(notable.length > 0 ? notable.map((message) => `• ${message}`) : ['• (none)']),
    ];
    if (input.deploy) {
      lines.push('', ...describeDeploy(input.deploy));
    }
    return lines.join('\n');
  }

  /**
   * Sends the summary through the configured notification command.
   * Failures are warnings; the promotion already happened.
   */
  async notify(input: NotificationInput): Promise<NotificationResult> {
    const { notification } = this.config;
    const message = await this.buildMessage(input);

    if (!notification.command) {
      return { status: 'skipped', message, warning: null };
    }
    if (!notification.target && notification.command.args.some((arg) => arg.includes('{target}'))) {
      const warning = 'No notification target configured (FORKFLOW_NOTIFY_TARGET); notification not sent';
      logger.warn(warning);
      return { status: 'skipped', message, warning };
    }

    const command = expandCommand(notification.command, {
      profile: notification.profile,
      channel: notification.channel,
      target: notification.target ?? '',
      message,
    });
    const result = await this.exec(command);
    if (result.exitCode !== 0) {
      const warning = 'Failed to send notification. The service may not be ready yet.';
      logger.warn(warning);
      return { status: 'failed', message, warning };
    }
    logger.info(`✓ Notification sent via ${notification.channel}`);
    return { status: 'sent', message, warning: null };
  }

  private async install(): Promise<StepStatus> {
    const { installCommand, installFallbackCommand } = this.config.build;
    if (!installCommand) {
      return 'skipped';
    }
    logger.info('Installing dependencies...');
    if (await this.runStep(installCommand)) {
      return 'ok';
    }
    if (installFallbackCommand) {
      logger.warn(`${formatCommand(installCommand)} failed, trying ${formatCommand(installFallbackCommand)}...`);
      return (await this.runStep(installFallbackCommand)) ? 'ok' : 'failed';
    }
    return 'failed';
  }

  private async runStep(command: CommandSpec): Promise<boolean> {
    return (await this.exec(command)).exitCode === 0;
  }

  private async exec(command: CommandSpec): Promise<{ exitCode: number }> {
    const result = await this.execCommand(command.command, command.args, { cwd: this.workspace.root });
    appendToLogFile(result.stdout);
    appendToLogFile(result.stderr);
    return result;
  }

  private async readVersion(): Promise<string> {
    if (!(await this.workspace.exists('package.json'))) {
      return 'unknown';
    }
    try {
      const parsed: unknown = JSON.parse(await this.workspace.read('package.json'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch (error) {
      logger.debug(`Could not read version from package.json: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 'unknown';
  }
}

function describeDeploy(report: DeployReport): string[] {
  const lines: string[] = [];
  if (report.build === 'ok') lines.push('✅ Build succeeded');
  if (report.build === 'failed') lines.push('⚠️ Build failed, previous build still running');
  if (report.marker === 'missing') lines.push('⚠️ Local modifications missing from build');
  if (report.service === 'healthy') lines.push('✅ Service restarted and healthy');
  if (report.service === 'restarted') lines.push('✅ Service restarted');
  if (report.service === 'unhealthy') lines.push('⚠️ Service restarted but not yet healthy');
  if (report.service === 'restart-failed') lines.push('⚠️ Service restart failed');
  return lines;
}
