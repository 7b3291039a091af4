export { Changelog, formatChangelogEntry } from './changelog';
export type { ChangelogEntry } from './changelog';
