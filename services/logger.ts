type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVELS, value);

const currentLevel = (): number => {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return LEVELS[isLogLevel(configured) ? configured : 'info'];
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// Tagged console output, e.g. "[Announcer] Speaking: person ahead, critical"
export const createLogger = (scope: string): Logger => {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (currentLevel() <= LEVELS.debug) console.debug(`${tag} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (currentLevel() <= LEVELS.info) console.log(`${tag} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (currentLevel() <= LEVELS.warn) console.warn(`${tag} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (currentLevel() <= LEVELS.error) console.error(`${tag} ${message}`, ...details);
    }
  };
};
