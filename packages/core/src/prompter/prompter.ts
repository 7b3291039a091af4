/**
 * Prompter - operator interaction behind an interface
 *
 * The CLI provides a terminal implementation; tests script the answers.
 */
export interface Prompter {
  /** Asks a free-text question and returns the trimmed answer */
  ask(question: string): Promise<string>;

  /** Opens a file of the checkout in the operator's editor and waits for it to close */
  edit(filePath: string): Promise<void>;

  /** Shows text to the operator */
  show(text: string): void;
}

/**
 * y/Y confirms; anything else declines.
 */
export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} (y/N): `);
  return /^[Yy]$/.test(answer);
}

/**
 * Prompter replaying canned answers, for tests and non-interactive runs.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly edited: string[] = [];
  readonly output: string[] = [];
  private readonly answers: string[];
  private readonly onEdit: ((filePath: string) => void) | undefined;

  constructor(answers: string[] = [], onEdit?: (filePath: string) => void) {
    this.answers = [...answers];
    this.onEdit = onEdit;
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${question}`);
    }
    return answer.trim();
  }

  async edit(filePath: string): Promise<void> {
    this.edited.push(filePath);
    this.onEdit?.(filePath);
  }

  show(text: string): void {
    this.output.push(text);
  }
}
