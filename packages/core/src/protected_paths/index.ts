export { ProtectedPaths, parseProtectedPaths, isGlobPattern } from './protected_paths';
export type { ProtectedPathEntry, ProtectedPathKind } from './protected_paths';
