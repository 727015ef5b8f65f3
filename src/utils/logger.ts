export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

export interface Logger {
  enabled: boolean;
  level: LogLevel;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  /** Headline for a phase of the run. */
  step(title: string, detail?: string): void;
}

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function shouldLog(level: Exclude<LogLevel, 'silent'>, desired: LogLevel): boolean {
  if (desired === 'silent') return false;
  return ORDER[level] <= ORDER[desired];
}

export function createLogger(enabled: boolean, level: LogLevel = 'info'): Logger {
  const emit = (
    target: 'log' | 'warn' | 'error',
    color: string,
    label: string,
    msg: string,
  ): void => {
    if (!enabled) return;
    console[target](`${color}${label}${COLORS.reset} ${msg}`);
  };

  return {
    enabled,
    level,
    info(message: string): void {
      if (shouldLog('info', level)) emit('log', COLORS.cyan, '[info]', message);
    },
    warn(message: string): void {
      if (shouldLog('warn', level)) emit('warn', COLORS.yellow, '[warn]', message);
    },
    error(message: string): void {
      if (shouldLog('error', level)) emit('error', COLORS.red, '[error]', message);
    },
    debug(message: string): void {
      if (shouldLog('debug', level)) emit('log', COLORS.gray, '[debug]', message);
    },
    step(title: string, detail?: string): void {
      if (!enabled || level === 'silent') return;
      const t = `${COLORS.magenta}${COLORS.bold}${title}${COLORS.reset}`;
      const d = detail ? `${COLORS.dim}${detail}${COLORS.reset}` : '';
      console.log(`${t} ${d}`.trim());
    },
  };
}

/** Default for library calls: logs nothing. */
export const silentLogger: Logger = createLogger(false, 'silent');
