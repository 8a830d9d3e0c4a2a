export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

/** All logging goes to stderr so stdout stays free for listings and the MCP transport. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const emit = (level: string, args: unknown[]) => {
    write([`[${level}]`, ...args.map(formatArg)].join(' '));
  };

  return {
    info: (...args) => emit('INFO', args),
    warn: (...args) => emit('WARN', args),
    error: (...args) => emit('ERROR', args),
    debug: (...args) => {
      if (options.verbose) emit('DEBUG', args);
    },
  };
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'string') return arg;
  return JSON.stringify(arg);
}
