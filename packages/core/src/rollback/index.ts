export { RollbackManager } from './rollback_manager';
export type {
  RollbackScope,
  RollbackTarget,
  RollbackPlan,
  RollbackResult,
  RollbackManagerDependencies,
} from './rollback_manager';
