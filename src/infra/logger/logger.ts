import chalk from 'chalk';
import type { AppConfigRequired } from '../config/config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(module: string, message: string): void;
  debug(module: string, message: string): void;
  warn(module: string, message: string): void;
  error(module: string, message: string): void;
}

export type LogWriter = (level: LogLevel, line: string) => void;

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.bgBlue.black,
  info: chalk.bgGreen.black,
  warn: chalk.bgYellow.black,
  error: chalk.bgRed.white,
};

// stable per module, so repeated tags are easy to follow
const MODULE_COLORS = [chalk.cyan, chalk.magenta, chalk.blue, chalk.green, chalk.yellow];

const moduleColorMap = new Map<string, (text: string) => string>();

function getModuleColor(module: string): (text: string) => string {
  const cached = moduleColorMap.get(module);
  if (cached) return cached;
  const hash = module.split('').reduce((acc, char) => acc + char.charCodeAt(0), 0);
  const color = MODULE_COLORS[hash % MODULE_COLORS.length];
  moduleColorMap.set(module, color);
  return color;
}

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function shouldLog(level: LogLevel, current: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(current);
}

function formatTimestamp(): string {
  const d = new Date();
  return d.toISOString().replace('T', ' ').replace('Z', '').slice(0, -1);
}

const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case 'debug':
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

export function createLogger(
  cfg: Pick<AppConfigRequired, 'logging'>,
  write: LogWriter = consoleWriter,
): Logger {
  const currentLevel = cfg.logging.level;
  const colorEnabled = cfg.logging.color;

  const base = (level: LogLevel) => (module: string, message: string) => {
    if (!shouldLog(level, currentLevel)) return;

    const ts = colorEnabled ? chalk.gray(formatTimestamp()) : formatTimestamp();
    const levelTag = colorEnabled ? LEVEL_COLORS[level](` ${level.toUpperCase()} `) : level.toUpperCase();
    const moduleTag = colorEnabled ? getModuleColor(module)(`[${module}]`) : `[${module}]`;

    write(level, `${ts} ${levelTag} ${moduleTag} ${message}`);
  };
  return {
    info: base('info'),
    debug: base('debug'),
    warn: base('warn'),
    error: base('error'),
  };
}

/** Drops everything; for events built without a logger. */
export const nullLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};
