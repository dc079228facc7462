import config from 'config';
import { z } from 'zod';
import { log, LogLevel } from './logger';

// These schemas should match the structure of config/default.json.

const logLevelSchema = z.nativeEnum(LogLevel);

// Environment variables arrive as strings; accept them for the boolean and numeric keys.
const booleanish = z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]);

const loggingSchema = z.object({
  consoleLogLevel: logLevelSchema,
  fileLogLevel: logLevelSchema,
  logFile: z.string().nullable(),
});

const parserSchema = z.object({
  lineEnding: z.enum(['auto', 'lf', 'crlf']),
  invalidDates: z.enum(['fail', 'skip']),
});

const generatorSchema = z.object({
  birthdayFile: z.string().min(1),
  callProbability: z.coerce.number().min(0).max(1),
  placeholderTodo: booleanish,
});

const appConfigSchema = z.object({
  appName: z.string(),
  logging: loggingSchema,
  parser: parserSchema,
  generator: generatorSchema,
});

export type LoggingConfig = z.infer<typeof loggingSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validates a raw configuration object against the application schema.
 * @throws ConfigError listing every offending key.
 */
export function validateConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

/**
 * Loads the application configuration using the 'config' package.
 * This reads config/default.json (plus the NODE_ENV file) and merges
 * environment variables according to config/custom-environment-variables.json.
 * @returns The fully resolved application configuration.
 */
export function loadConfig(): AppConfig {
  const loadedConfig = validateConfig(config.util.toObject());
  log(LogLevel.DEBUG, 'Application config loaded:', { appConfig: loadedConfig });
  return loadedConfig;
}

