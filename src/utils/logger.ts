import winston from 'winston';
import fs from 'fs';
import { config } from './config.js';

// Tests run silent and must not touch the data directory
if (!config.logging.silent && !fs.existsSync(config.paths.dataDir)) {
  fs.mkdirSync(config.paths.dataDir, { recursive: true });
}

const fileTransports = config.logging.silent
  ? []
  : [
      new winston.transports.File({
        filename: config.paths.logFile,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
      }),
    ];

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      ),
    }),
    ...fileTransports,
  ],
});
