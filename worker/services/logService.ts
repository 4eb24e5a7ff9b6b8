export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = () => threshold;

type Writer = (message: string, ...details: unknown[]) => void;

const writers: Record<Exclude<LogLevel, 'silent'>, Writer> = {
  debug: (message, ...details) => console.debug(message, ...details),
  info: (message, ...details) => console.info(message, ...details),
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
};

export type Logger = Record<Exclude<LogLevel, 'silent'>, (message: string, details?: Record<string, unknown>) => void>;

export const createLogger = (scope: string): Logger => {
  const emit = (level: Exclude<LogLevel, 'silent'>) => (message: string, details?: Record<string, unknown>) => {
    if (rank[level] < rank[threshold]) return;
    const line = `[${scope}] ${message}`;
    if (details) writers[level](line, details);
    else writers[level](line);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
};
