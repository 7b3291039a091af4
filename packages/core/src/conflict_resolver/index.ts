export { ConflictResolver } from './conflict_resolver';
export type { ConflictResolverDependencies } from './conflict_resolver';
export { resolveInteractively, parseConflictChoice, describeConflictEntry } from './interactive';
export type { InteractiveResolutionResult } from './interactive';
export { scanConflictMarkers, countConflictSections } from './conflict_markers';
export type {
  ConflictAction,
  ConflictResolution,
  ConflictEntry,
  ResolveOutcome,
  CompletionResult,
} from './conflict_resolver.types';
