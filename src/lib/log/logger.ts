import pino from 'pino';
import { getSettings, SettingsError } from '@/lib/config/settings';
import type { CatalogSettings } from '@/lib/config/settings';

// Thin logger wrapper around pino with a console fallback.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'true' to enable the pino-pretty transport
// - USE_PINO: 'false' to force the console fallback

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug: (obj: object, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

const LEVEL_ORDER = ['debug', 'info', 'warn', 'error', 'silent'] as const;

function createConsoleWrapper(level: string, bindings: Record<string, unknown> = {}): Logger {
  const prefix = Object.keys(bindings).length > 0
    ? `[${Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
    : '';
  const threshold = LEVEL_ORDER.findIndex((name) => name === level);
  const enabled = (name: (typeof LEVEL_ORDER)[number]) => LEVEL_ORDER.indexOf(name) >= threshold;

  return {
    info: (obj, msg) => { if (enabled('info')) console.log(prefix, msg || '', obj); },
    warn: (obj, msg) => { if (enabled('warn')) console.warn(prefix, msg || '', obj); },
    error: (obj, msg) => { if (enabled('error')) console.error(prefix, msg || '', obj); },
    debug: (obj, msg) => { if (enabled('debug')) console.debug(prefix, msg || '', obj); },
    child: (more) => createConsoleWrapper(level, { ...bindings, ...more }),
  };
}

function wrapPino(base: pino.Logger): Logger {
  return {
    info: (obj, msg) => base.info(obj, msg),
    warn: (obj, msg) => base.warn(obj, msg),
    error: (obj, msg) => base.error(obj, msg),
    debug: (obj, msg) => base.debug(obj, msg),
    child: (bindings) => wrapPino(base.child(bindings)),
  };
}

type LoggerSettings = Pick<CatalogSettings, 'logLevel' | 'logPretty' | 'usePino'>;

const FALLBACK_SETTINGS: LoggerSettings = { logLevel: 'info', logPretty: false, usePino: false };

// An invalid environment yields a console logger at info level instead of
// failing the import; SettingsError still surfaces from getSettings() elsewhere.
function readSettings(load: () => LoggerSettings): LoggerSettings {
  try {
    return load();
  } catch (error) {
    if (!(error instanceof SettingsError)) throw error;
    console.warn('[logger] falling back to console:', error.message);
    return FALLBACK_SETTINGS;
  }
}

export function createLogger(load: () => LoggerSettings = getSettings): Logger {
  const { logLevel, logPretty, usePino } = readSettings(load);

  if (!usePino) {
    return createConsoleWrapper(logLevel);
  }

  // A missing pino-pretty install or a failing transport worker falls back to console.
  try {
    const options: pino.LoggerOptions = { level: logLevel };
    if (logPretty) {
      options.transport = {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' },
      };
    }
    return wrapPino(pino(options));
  } catch {
    return createConsoleWrapper(logLevel);
  }
}

export const logger: Logger = createLogger();

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return logger.child(bindings);
  }
  return logger;
}
