/**
 * Error thrown when a backup tag cannot be created or does not point where it should
 */
export class BackupError extends Error {
  public readonly tagName: string;

  constructor(message: string, tagName: string) {
    super(message);
    this.name = 'BackupError';
    this.tagName = tagName;
    Object.setPrototypeOf(this, BackupError.prototype);
  }
}

/**
 * Error thrown when a backup or emergency tag does not exist
 */
export class BackupNotFoundError extends BackupError {
  constructor(tagName: string) {
    super(`Backup tag not found: ${tagName}`, tagName);
    this.name = 'BackupNotFoundError';
    Object.setPrototypeOf(this, BackupNotFoundError.prototype);
  }
}
