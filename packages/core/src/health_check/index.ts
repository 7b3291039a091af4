export { HealthChecker, repositoryPath } from './health_check';
export type {
  CheckStatus,
  CheckCategory,
  HealthCheckItem,
  HealthReport,
  HealthCheckerDependencies,
} from './health_check';
