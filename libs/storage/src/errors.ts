/**
 * Storage error types
 */

export class ValidationError extends Error {
  public readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ProfileNotFoundError extends Error {
  public readonly code = 'PROFILE_NOT_FOUND';

  constructor(public readonly profile: string) {
    super(`Profile "${profile}" does not exist.`);
    this.name = 'ProfileNotFoundError';
  }
}

export class ProfileExistsError extends Error {
  public readonly code = 'PROFILE_EXISTS';

  constructor(public readonly profile: string) {
    super(`Profile "${profile}" already exists.`);
    this.name = 'ProfileExistsError';
  }
}

export class DatabaseTamperError extends Error {
  public readonly code = 'DATABASE_TAMPERED';

  constructor(message = 'Database file has an unexpected application_id; it may have been replaced.') {
    super(message);
    this.name = 'DatabaseTamperError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}
