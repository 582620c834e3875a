// Runtime settings for the media catalog, read from the environment
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_DATA_DIR = './data';
const DEFAULT_DATABASE_NAME = 'main.db';

const flag = (truthy: string) =>
  z
    .string()
    .optional()
    .transform((value) => value === truthy);

const SettingsSchema = z.object({
  MEDIA_CATALOG_DATA_DIR: z.string().trim().min(1).default(DEFAULT_DATA_DIR),
  MEDIA_CATALOG_DB_NAME: z.string().trim().min(1).default(DEFAULT_DATABASE_NAME),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_PRETTY: flag('true'),
  USE_PINO: z
    .string()
    .optional()
    .transform((value) => value !== 'false'),
  DB_LOG_QUERIES: flag('1'),
});

export interface CatalogSettings {
  /** Directory that holds the database file */
  dataDir: string;
  /** Database file name inside dataDir */
  databaseName: string;
  logLevel: LogLevel;
  /** Route pino output through pino-pretty */
  logPretty: boolean;
  /** false forces the console logger */
  usePino: boolean;
  /** Log every SQL statement at debug level */
  logQueries: boolean;
}

export class SettingsError extends Error {
  constructor(public readonly variables: string[], message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * Parse settings from an environment map
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): CatalogSettings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const variables = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new SettingsError(
      variables,
      `Invalid environment: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }

  const values = parsed.data;
  return {
    dataDir: values.MEDIA_CATALOG_DATA_DIR,
    databaseName: values.MEDIA_CATALOG_DB_NAME,
    logLevel: values.LOG_LEVEL,
    logPretty: values.LOG_PRETTY,
    usePino: values.USE_PINO,
    logQueries: values.DB_LOG_QUERIES,
  };
}

let cached: CatalogSettings | null = null;

/**
 * Settings for this process (parsed once)
 */
export function getSettings(): CatalogSettings {
  if (!cached) {
    cached = loadSettings();
  }
  return cached;
}
