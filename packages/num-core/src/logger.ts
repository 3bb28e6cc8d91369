export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Emitting = Exclude<LogLevel, 'silent'>;

/**
 * Logger writing through `console` (or any console-shaped sink), dropping
 * messages below `level`. Lines are prefixed with `[scope]` when a scope is given.
 */
export function createConsoleLogger(
  level: LogLevel = 'warn',
  sink: ConsoleSink = console,
  scope?: string
): Logger {
  const prefix = scope ? `[${scope}] ` : '';
  const emit = (lvl: Emitting) => (message: string, meta?: LogMeta): void => {
    if (RANK[lvl] < RANK[level]) return;
    if (meta === undefined) sink[lvl](prefix + message);
    else sink[lvl](prefix + message, meta);
  };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
