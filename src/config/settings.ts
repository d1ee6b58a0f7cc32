import { z } from 'zod';

const API_KEY_URL = 'https://www.diigo.com/api_keys/new/';

const REQUIRED_VARIABLES = ['DIIGO_USERNAME', 'DIIGO_PASSWORD', 'DIIGO_API_KEY'] as const;

// 空字符串视为未设置
const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value : undefined));

const intWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? Number(value) : fallback))
    .pipe(z.number().int().nonnegative());

const numberWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? Number(value) : fallback))
    .pipe(z.number().positive());

const envSchema = z.object({
  DIIGO_USERNAME: optionalText,
  DIIGO_PASSWORD: optionalText,
  DIIGO_API_KEY: optionalText,
  DIIGO_BASE_URL: optionalText,
  REQUEST_TIMEOUT: intWithDefault(10),
  MAX_BOOKMARKS_PER_REQUEST: intWithDefault(100).pipe(z.number().min(1)),
  MAX_RETRIES: intWithDefault(3),
  RETRY_BACKOFF: numberWithDefault(2),
  CACHE_TTL: intWithDefault(300)
});

export interface DiigoConfig {
  username: string;
  password: string;
  apiKey: string;
  baseUrl: string;
  requestTimeoutSeconds: number;
  maxBookmarksPerRequest: number;
  maxRetries: number;
  retryBackoff: number;
  cacheTtlSeconds: number;     // reserved, nothing reads it yet
}

export const DEFAULT_BASE_URL = 'https://secure.diigo.com/api/v2';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// 配置管理器
export class ConfigManager {
  /**
   * Read and validate the configuration from environment variables.
   * Throws ConfigError naming every missing or malformed variable.
   */
  static load(env: NodeJS.ProcessEnv = process.env): DiigoConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${problems}`);
    }

    const values = parsed.data;
    const username = values.DIIGO_USERNAME;
    const password = values.DIIGO_PASSWORD;
    const apiKey = values.DIIGO_API_KEY;
    if (!username || !password || !apiKey) {
      const missing = REQUIRED_VARIABLES.filter(name => !values[name]);
      throw new ConfigError(
        `Missing required environment variables: ${missing.join(', ')}\n` +
        'Please set them in your environment.\n' +
        `Get your API key at: ${API_KEY_URL}`
      );
    }

    return {
      username,
      password,
      apiKey,
      baseUrl: values.DIIGO_BASE_URL ?? DEFAULT_BASE_URL,
      requestTimeoutSeconds: values.REQUEST_TIMEOUT,
      maxBookmarksPerRequest: values.MAX_BOOKMARKS_PER_REQUEST,
      maxRetries: values.MAX_RETRIES,
      retryBackoff: values.RETRY_BACKOFF,
      cacheTtlSeconds: values.CACHE_TTL
    };
  }

  /**
   * Default user for operations that don't name one
   */
  static getDefaultUser(config: DiigoConfig): string {
    return config.username;
  }
}
