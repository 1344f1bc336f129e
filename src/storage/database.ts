import fs from 'fs';
import dayjs from 'dayjs';
import path from 'path';
import type { DatabaseDocument } from '../types/index.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { DatabaseSchema } from './schema.js';

export function emptyDatabase(): DatabaseDocument {
  return { version: 1, currentStudent: null, students: [] };
}

// Keep the unreadable file so the next save does not destroy it. Earlier
// backups are never overwritten; failing to back up is fatal.
function setAsideCorruptFile(filePath: string): string {
  const stamp = dayjs().format('YYYYMMDD-HHmmss');
  let backup = `${filePath}.corrupt-${stamp}`;
  for (let n = 1; fs.existsSync(backup); n++) {
    backup = `${filePath}.corrupt-${stamp}-${n}`;
  }

  try {
    fs.copyFileSync(filePath, backup, fs.constants.COPYFILE_EXCL);
  } catch (error) {
    throw new Error(`Database ${filePath} is unreadable and could not be backed up: ${error}`);
  }
  logger.warn(`Copied unreadable database to ${backup}`);
  return backup;
}

/**
 * Read the whole document. A missing, unparseable or invalid file yields an
 * empty document; the invalid file is copied aside first. File-system errors
 * propagate.
 */
export function loadDatabase(filePath: string = config.paths.database): DatabaseDocument {
  if (!fs.existsSync(filePath)) {
    return emptyDatabase();
  }

  const text = fs.readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    setAsideCorruptFile(filePath);
    logger.warn(`Database is corrupted (${error}). Starting with empty data.`);
    return emptyDatabase();
  }

  const result = DatabaseSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    setAsideCorruptFile(filePath);
    logger.warn(
      `Database failed validation at ${issue.path.join('.') || '<root>'}: ${issue.message}. Starting with empty data.`
    );
    return emptyDatabase();
  }

  return result.data;
}

/**
 * Write the document to a temporary file and rename it over the target.
 */
export function saveDatabase(db: DatabaseDocument, filePath: string = config.paths.database): boolean {
  const tempPath = `${filePath}.tmp`;
  try {
    const dataDir = path.dirname(filePath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    fs.writeFileSync(tempPath, JSON.stringify(db, null, 2));
    fs.renameSync(tempPath, filePath);
    return true;
  } catch (error) {
    logger.error(`Failed to save database: ${error}`);
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath);
    return false;
  }
}

export function resetDatabase(filePath: string = config.paths.database): void {
  fs.rmSync(filePath, { force: true });
  logger.info('Database reset completed');
}
