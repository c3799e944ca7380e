export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type ImportEnv = Readonly<{
  brazeApiKey: string;
  /** Base REST URL without a trailing slash. */
  brazeApiUrl: string;
  /** Batches sent concurrently in a round. */
  threads: number;
  logLevel: LogLevel;
  requestTimeoutMs: number;
}>;

/** The environment is missing a value or holds an invalid one. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type EnvSource = Readonly<Record<string, string | undefined>>;

function requiredString(env: EnvSource, key: string): string {
  const value = env[key];
  if (!value?.trim()) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function optionalString(env: EnvSource, key: string): string | undefined {
  const trimmed = env[key]?.trim();
  return trimmed ? trimmed : undefined;
}

function parseApiUrl(env: EnvSource, key: string): string {
  const value = requiredString(env, key);
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw new ConfigError(`Invalid URL in ${key}: ${value}${error instanceof Error ? ` (${error.message})` : ''}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`Invalid URL protocol for ${key}: ${url.protocol}`);
  }
  return value.replace(/\/+$/, '');
}

function parsePositiveInteger(env: EnvSource, key: string, fallback: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Invalid ${key}: ${raw}`);
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value ?? 'info';
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new ConfigError(`Invalid LOG_LEVEL: ${normalized}`);
}

/**
 * Read the import settings from the process environment.
 *
 * @throws ConfigError on the first missing or invalid variable.
 */
export function loadImportEnv(env: EnvSource): ImportEnv {
  return Object.freeze({
    brazeApiKey: requiredString(env, 'BRAZE_API_KEY'),
    brazeApiUrl: parseApiUrl(env, 'BRAZE_API_URL'),
    threads: parsePositiveInteger(env, 'THREADS', 15),
    logLevel: parseLogLevel(optionalString(env, 'LOG_LEVEL')),
    requestTimeoutMs: parsePositiveInteger(env, 'REQUEST_TIMEOUT_MS', 30000),
  });
}
