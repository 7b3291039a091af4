export { IntegrationMerger, buildSyncMessage, conflictRemediation } from './integration_merger';
export type {
  IntegrationMergeInput,
  IntegrationMergeResult,
  IntegrationMergerDependencies,
} from './integration_merger';
