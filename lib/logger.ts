/**
 * Scoped console logger. Debug lines only print when NODE_ENV=development.
 */

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, ctx?: LogContext) => void;
  info: (message: string, ctx?: LogContext) => void;
  warn: (message: string, ctx?: LogContext) => void;
  error: (message: string, ctx?: LogContext) => void;
};

function isDev(): boolean {
  return process.env.NODE_ENV === "development";
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const emit = (fn: (...args: unknown[]) => void, message: string, ctx?: LogContext) => {
    if (ctx && Object.keys(ctx).length > 0) fn(prefix, message, ctx);
    else fn(prefix, message);
  };
  return {
    debug: (message, ctx) => {
      if (!isDev()) return;
      emit(console.log, message, ctx);
    },
    info: (message, ctx) => emit(console.log, message, ctx),
    warn: (message, ctx) => emit(console.warn, message, ctx),
    error: (message, ctx) => emit(console.error, message, ctx),
  };
}
