export interface Logger {
  debug: (...args: unknown[]) => void;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  setDebugMode: (enabled: boolean) => void;
  isDebugEnabled: () => boolean;
}

function write(stream: NodeJS.WriteStream, args: unknown[]): void {
  try {
    stream.write(args.map(a => (a instanceof Error ? a.stack ?? a.message : String(a))).join(' ') + '\n');
  } catch {
    // fallback to noop
  }
}

export function error(...args: unknown[]): void {
  write(process.stderr, args);
}

export function warn(...args: unknown[]): void {
  write(process.stderr, args);
}

export function info(...args: unknown[]): void {
  write(process.stdout, args);
}

export function createLogger(debugMode: boolean | string = false): Logger {
  let isDebugEnabled = typeof debugMode === 'string' ? debugMode === 'true' : Boolean(debugMode);

  const debug = (...args: unknown[]): void => {
    if (isDebugEnabled) {
      write(process.stdout, args);
    }
  };

  return {
    debug,
    log: debug,
    error,
    warn,
    info,
    setDebugMode: (enabled: boolean) => {
      isDebugEnabled = enabled;
    },
    isDebugEnabled: () => isDebugEnabled,
  };
}

