// src/utils/logger.ts
import { CFG } from '../config.js';

interface LogLevel {
  ERROR: 0;
  WARN: 1;
  INFO: 2;
  DEBUG: 3;
}

type LevelName = keyof LogLevel;

const LOG_LEVELS: LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

function isLevelName(value: string): value is LevelName {
  return value in LOG_LEVELS;
}

class Logger {
  private level: number;

  constructor(level: LevelName = 'INFO') {
    this.level = LOG_LEVELS[level];
  }

  private log(level: LevelName, message: string, meta?: Record<string, unknown>) {
    if (LOG_LEVELS[level] <= this.level) {
      const timestamp = new Date().toISOString();

      if (level === 'ERROR') {
        console.error(`[${timestamp}] ${level}: ${message}`, meta || '');
      } else if (level === 'WARN') {
        console.warn(`[${timestamp}] ${level}: ${message}`, meta || '');
      } else {
        console.log(`[${timestamp}] ${level}: ${message}`, meta || '');
      }
    }
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log('DEBUG', message, meta);
  }
}

const configured = CFG.logLevel.toUpperCase();
export const logger = new Logger(isLevelName(configured) ? configured : 'INFO');
