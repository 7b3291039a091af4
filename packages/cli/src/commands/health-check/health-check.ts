import { Command } from 'commander';
import { HealthCheckCommand } from './health-check-command';

/**
 * Register `forkflow health-check`
 */
export function registerHealthCheckCommand(program: Command): void {
  new HealthCheckCommand().register(program);
}
