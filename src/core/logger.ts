export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
  now?: () => Date;
}

// stdout carries rendered results; every log line goes to stderr
const writeToStderr = (line: string): void => {
  console.error(line);
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write = options.write ?? writeToStderr;
  const now = options.now ?? (() => new Date());
  const verbose = options.verbose ?? false;

  const log = (level: LogLevel, message: string): void => {
    if (level === 'DEBUG' && !verbose) return;
    write(`[${now().toISOString()}] [${scope}] [${level}] ${message}`);
  };

  return {
    debug: (message) => log('DEBUG', message),
    info: (message) => log('INFO', message),
    warn: (message) => log('WARN', message),
    error: (message) => log('ERROR', message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options)
  };
}

/**
 * Logger that drops everything. Default for library callers that pass none.
 */
export const silentLogger: Logger = createLogger('silent', { write: () => undefined });
