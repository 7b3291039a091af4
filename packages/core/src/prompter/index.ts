export { ScriptedPrompter, confirm } from './prompter';
export type { Prompter } from './prompter';
