import pino from 'pino';
import { join } from 'path';
import { homedir } from 'os';
import { ensureDirSync } from '../utils/fs.js';

const LOG_DIR = join(homedir(), '.vitalsense', 'logs');

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  verbose?: boolean;
  destination?: string;
}

export function createLogger(name: string = 'vitalsense', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

  if (options.verbose) {
    return pino({
      name,
      level: options.level ?? 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  // A file destination given by the caller is created by pino itself
  if (!options.destination) {
    ensureDirSync(LOG_DIR);
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: options.destination ?? join(LOG_DIR, 'vitalsense.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

export type Logger = pino.Logger;
