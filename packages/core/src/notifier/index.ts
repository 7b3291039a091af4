export { PostPromotionNotifier, expandCommand, selectNotableCommits } from './notifier';
export type {
  StepStatus,
  ServiceStatus,
  DeployReport,
  NotificationInput,
  NotificationResult,
  PostPromotionNotifierDependencies,
} from './notifier';
