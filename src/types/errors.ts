export class AddonKeeperError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path ? `${message} (Path: ${path})` : message);
    this.name = 'AddonKeeperError';
    this.path = path;
  }
}

function toMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(1);
}

export class InsufficientSpaceError extends AddonKeeperError {
  readonly requiredBytes: number;
  readonly availableBytes: number;

  constructor(requiredBytes: number, availableBytes: number, path: string) {
    super(
      `Insufficient disk space. Required: ${toMegabytes(requiredBytes)}MB, Available: ${toMegabytes(availableBytes)}MB`,
      path,
    );
    this.name = 'InsufficientSpaceError';
    this.requiredBytes = requiredBytes;
    this.availableBytes = availableBytes;
  }
}

export class PermissionDeniedError extends AddonKeeperError {
  readonly operation: string;

  constructor(path: string, operation = 'access') {
    super(`Permission denied for ${operation} on ${path}`, path);
    this.name = 'PermissionDeniedError';
    this.operation = operation;
  }
}

export class BackupSessionActiveError extends AddonKeeperError {
  readonly identity: string;

  constructor(identity: string) {
    super(`Backup session ${identity} already active`);
    this.name = 'BackupSessionActiveError';
    this.identity = identity;
  }
}

export class InstallationNotFoundError extends AddonKeeperError {
  constructor(path: string | null = null) {
    super('No game installation found', path);
    this.name = 'InstallationNotFoundError';
  }
}

export class SavedVariablesNotFoundError extends AddonKeeperError {
  constructor(path: string) {
    super(`SavedVariables directory not found at ${path}`, path);
    this.name = 'SavedVariablesNotFoundError';
  }
}

export class ConfigurationError extends AddonKeeperError {
  readonly configKey: string | null;

  constructor(message: string, configKey: string | null = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}
