export {
  BackupManager,
  BRANCH_ROLES,
  formatSessionTimestamp,
  backupTagName,
  parseBackupTagName,
} from './backup_manager';
export type { BackupManagerDependencies } from './backup_manager';
export type { BackupKind, BackupTag, ParsedBackupTagName } from './backup.types';
export { BackupError, BackupNotFoundError } from './errors';
