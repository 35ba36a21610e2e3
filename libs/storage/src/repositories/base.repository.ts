/**
 * Abstract base repository
 *
 * Provides common utilities: DB access, Zod validation, timestamps.
 */

import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { ValidationError } from '../errors';

export abstract class BaseRepository {
  constructor(protected readonly db: Database.Database) {}

  /**
   * Validate data against a Zod schema. Throws ValidationError on failure.
   */
  protected validate<S extends z.ZodType>(schema: S, data: unknown): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(
        `Validation failed: ${result.error.issues.map((i) => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`).join('; ')}`,
        result.error.issues,
      );
    }
    return result.data;
  }

  /**
   * Get current ISO datetime string.
   */
  protected now(): string {
    return new Date().toISOString();
  }
}
