import winston from 'winston';
import fs from 'fs';

/**
 * Bridge logging. The codec itself never logs.
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
];

// File output is opt-in; containers often run read-only
const LOG_TO_FILES = process.env.LOG_TO_FILES === 'true';
if (LOG_TO_FILES) {
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }
  transports.push(
    new winston.transports.File({
      filename: 'logs/bridge-error.log',
      level: 'error',
    }),
    new winston.transports.File({
      filename: 'logs/bridge.log',
    }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'airtrack-link' },
  transports,
});

export default logger;
