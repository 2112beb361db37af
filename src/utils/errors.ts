export class HttpError extends Error {
  public statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

/**
 * Raised when required canonical columns cannot be resolved from an uploaded
 * file's headers. Carries both sets so the uploader can see what was found.
 */
export class SchemaError extends Error {
  public readonly missing: string[];
  public readonly found: string[];

  constructor(missing: string[], found: string[]) {
    super(`Missing required columns: ${missing.join(', ')}`);
    this.name = 'SchemaError';
    this.missing = missing;
    this.found = found;
  }
}

export class SnapshotConflictError extends HttpError {
  public readonly expectedVersion: number;
  public readonly currentVersion: number;

  constructor(expectedVersion: number, currentVersion: number) {
    super(409, `Order book changed since version ${expectedVersion} (now ${currentVersion}); reload before saving`);
    this.name = 'SnapshotConflictError';
    this.expectedVersion = expectedVersion;
    this.currentVersion = currentVersion;
  }
}
