// Scoped structured logger for pipeline diagnostics
// Writes to stderr so stdout stays free for the MCP JSON-RPC stream

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLevel(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let threshold: LogLevel | 'silent' = resolveThreshold(process.env.STOCKDESK_LOG_LEVEL);

function resolveThreshold(raw: string | undefined): LogLevel | 'silent' {
  const value = raw?.trim().toLowerCase() ?? '';
  return isLevel(value) ? value : 'info';
}

/** Override the threshold read from STOCKDESK_LOG_LEVEL at load time */
export function setLogLevel(level: LogLevel | 'silent'): void {
  threshold = level;
}

export function getLogLevel(): LogLevel | 'silent' {
  return threshold;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
