import { ScriptedPrompter, confirm } from './prompter';

describe('ScriptedPrompter', () => {
  it('should replay answers and record questions', async () => {
    const prompter = new ScriptedPrompter([' yes ', 'n']);

    expect(await prompter.ask('Promote? ')).toBe('yes');
    expect(await confirm(prompter, 'Proceed with sync?')).toBe(false);
    expect(prompter.questions).toEqual(['Promote? ', 'Proceed with sync? (y/N): ']);
  });

  it('should fail when it runs out of answers', async () => {
    await expect(new ScriptedPrompter().ask('Anything?')).rejects.toThrow('No scripted answer for: Anything?');
  });

  it('should treat y and Y as confirmation', async () => {
    expect(await confirm(new ScriptedPrompter(['Y']), 'Go?')).toBe(true);
    expect(await confirm(new ScriptedPrompter(['yes']), 'Go?')).toBe(false);
  });

  it('should run the edit hook', async () => {
    const seen: string[] = [];
    const prompter = new ScriptedPrompter([], (filePath) => seen.push(filePath));
    await prompter.edit('src/app.ts');
    expect(seen).toEqual(['src/app.ts']);
    expect(prompter.edited).toEqual(['src/app.ts']);
  });
});
