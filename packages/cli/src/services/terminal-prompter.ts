import { spawn } from 'child_process';
import * as path from 'path';
import * as readline from 'readline';
import type { Prompter } from '@forkflow/core';

/**
 * Prompter reading answers from the terminal.
 * Manual edits open $VISUAL, then $EDITOR, then vi.
 */
export class TerminalPrompter implements Prompter.Prompter {
  constructor(
    private readonly root: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) { }

  ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    return new Promise<string>((resolve) => {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer.trim());
      });
    });
  }

  edit(filePath: string): Promise<void> {
    const [editor = 'vi', ...editorArgs] = (this.env['VISUAL'] || this.env['EDITOR'] || 'vi').split(/\s+/).filter(Boolean);

    return new Promise<void>((resolve, reject) => {
      const proc = spawn(editor, [...editorArgs, path.join(this.root, filePath)], {
        cwd: this.root,
        stdio: 'inherit',
      });
      proc.on('error', reject);
      proc.on('close', (code: number | null) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${editor} exited with code ${code ?? 'null'}`));
        }
      });
    });
  }

  show(text: string): void {
    console.log(text);
  }
}
