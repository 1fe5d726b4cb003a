import { InvalidConfigError } from './errors';

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export interface TestConfig {
  readonly baseUrl: string;
  readonly totalRequests: number;
  readonly workers: number;
  readonly percentiles: readonly number[];
  /** Per-attempt timeout in milliseconds. */
  readonly timeout: number;
  readonly backoff: Readonly<BackoffPolicy>;
  readonly outputFile?: string;
}

export const DEFAULT_BACKOFF: Readonly<BackoffPolicy> = {
  initialDelayMs: 20,
  maxDelayMs: 5000,
  maxAttempts: 10
};

export const DEFAULT_PERCENTILES: readonly number[] = [50, 90, 95, 99];

export interface Endpoint {
  name: string;
  path: string;
}

export const endpoints = {
  listComments: { name: 'List Comments', path: '/comments' },
  addComment: { name: 'Add Comment', path: '/comment' }
} as const satisfies Record<string, Endpoint>;

/** Raw settings as they arrive from the environment or the command line. */
export interface ConfigInput {
  host?: string;
  requests?: string;
  threads?: string;
  percentiles?: string;
  timeout?: string;
  output?: string;
}

const CONFIG_KEYS = ['host', 'requests', 'threads', 'percentiles', 'timeout', 'output'] as const satisfies readonly (keyof ConfigInput)[];

export const MAX_WORKERS = 10_000;

export const parseInteger = (field: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidConfigError(field, `expected an integer, got "${raw}"`);
  }
  const value = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidConfigError(field, `"${trimmed}" is out of range`);
  }
  if (value < min) {
    throw new InvalidConfigError(field, `must be >= ${min}, got ${value}`);
  }
  if (value > max) {
    throw new InvalidConfigError(field, `must be <= ${max}, got ${value}`);
  }
  return value;
};

export const parsePercentiles = (raw: string): number[] => {
  const values = raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const value = Number(part);
      if (!Number.isFinite(value) || value < 0 || value > 100) {
        throw new InvalidConfigError('percentiles', `"${part}" is not a percentile between 0 and 100`);
      }
      return value;
    });

  if (values.length === 0) {
    throw new InvalidConfigError('percentiles', 'at least one percentile is required');
  }
  return [...new Set(values)].sort((a, b) => a - b);
};

export const parseBaseUrl = (raw: string): string => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidConfigError('host', `"${raw}" is not a valid URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidConfigError('host', `unsupported protocol ${url.protocol}`);
  }
  return raw.replace(/\/+$/, '');
};

export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): ConfigInput => ({
  host: env.GUESTBOOK_URL,
  requests: env.REQUESTS,
  threads: env.THREADS,
  percentiles: env.PERCENTILES,
  timeout: env.TIMEOUT,
  output: env.OUTPUT_FILE
});

/**
 * Builds a validated config. Later inputs win, so callers pass the
 * environment first and command-line flags after it.
 */
export const loadConfig = (...inputs: ConfigInput[]): TestConfig => {
  const merged: ConfigInput = {};
  for (const input of inputs) {
    for (const key of CONFIG_KEYS) {
      const value = input[key];
      if (value !== undefined && value !== '') {
        merged[key] = value;
      }
    }
  }

  return {
    baseUrl: parseBaseUrl(merged.host || 'http://localhost:8080'),
    totalRequests: parseInteger('requests', merged.requests || '1000', 0),
    workers: parseInteger('threads', merged.threads || '10', 1, MAX_WORKERS),
    percentiles: merged.percentiles ? parsePercentiles(merged.percentiles) : DEFAULT_PERCENTILES,
    timeout: parseInteger('timeout', merged.timeout || '30000', 1),
    backoff: DEFAULT_BACKOFF,
    outputFile: merged.output
  };
};
