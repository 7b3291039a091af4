import { spawn } from 'child_process';
import type { Git } from '@forkflow/core';

/**
 * ExecCommand backed by child_process.spawn.
 * Output is buffered; a process that cannot be started resolves with exit code 127.
 */
export function createExecCommand(defaultCwd: string): Git.ExecCommand {
  return (command: string, args: string[], options?: Git.ExecOptions) => {
    return new Promise<Git.ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd,
        env: { ...process.env, ...options?.env },
        timeout: options?.timeout,
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 127, stdout, stderr: stderr + error.message });
      });
    });
  };
}
