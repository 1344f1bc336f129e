import path from 'path';
import { fileURLToPath } from 'url';
import type { Config } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

const dataDir = process.env.STUDY_TRACKER_DATA_DIR || path.join(projectRoot, 'data');

export const config: Config = {
  paths: {
    dataDir,
    database: path.join(dataDir, 'database.json'),
    logFile: path.join(dataDir, 'tracker.log'),
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test',
  },
  auth: {
    saltRounds: Number(process.env.STUDY_TRACKER_BCRYPT_ROUNDS) || 10,
  },
  analytics: {
    pointsPerStudyHour: 10,
    completionWeight: 100,
    pointsPerCompletedTask: 50,
  },
};
