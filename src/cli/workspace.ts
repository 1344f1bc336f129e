import type { DatabaseDocument, Student } from '../types/index.js';
import { loadDatabase, saveDatabase } from '../storage/database.js';
import { getCurrentStudent } from '../auth/accounts.js';
import { config } from '../utils/config.js';
import { isTrackerError, TrackerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface Workspace {
  db: DatabaseDocument;
  student: Student;
}

export function openWorkspace(): Workspace {
  const db = loadDatabase();
  const student = getCurrentStudent(db);
  if (!student) {
    throw new TrackerError(
      'Not logged in. Run "study-tracker login" or "study-tracker register" first.',
      'AUTH'
    );
  }
  return { db, student };
}

export function persist(db: DatabaseDocument): void {
  if (!saveDatabase(db)) {
    throw new Error(`Could not write ${config.paths.database}`);
  }
}

export function reportFailure(action: string, error: unknown): never {
  if (isTrackerError(error)) {
    console.error(`Error: ${error.message}`);
    process.exit(1);
  }

  logger.error(`${action} failed: ${error}`);
  console.error(`\n${action} failed: ${error}`);
  process.exit(1);
}

export function parseNumber(value: string, label: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new TrackerError(`${label} must be a number`, 'VALIDATION');
  }
  return parsed;
}
