import 'dotenv/config';
import { z } from 'zod';
import type { ILogger } from '@keepsake/types';

const optionalString = z
  .string()
  .transform(value => value.trim())
  .transform(value => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  SITE_URL: z.string().url().default('http://localhost:4000'),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),
  SESSION_SECRET: z.string().min(16, 'SESSION_SECRET must be at least 16 characters'),
  SESSION_MAX_AGE_MS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60 * 1000),
  ADMIN_API_TOKEN: optionalString,
  ADMIN_API_TOKEN_PREVIOUS: optionalString,
  ASSET_STORE_URL: optionalString,
  ASSET_STORE_TOKEN: optionalString,
  ASSET_PUBLIC_URL: optionalString,
  LOCAL_UPLOAD_DIR: z.string().default('public/uploads'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  MUSIC_CLIENT_ID: optionalString,
  MUSIC_CLIENT_SECRET: optionalString,
  MUSIC_TOKEN_URL: z.string().url().default('https://accounts.spotify.com/api/token'),
  MUSIC_API_BASE: z.string().url().default('https://api.spotify.com/v1'),
  MUSIC_MARKET: z.string().length(2).default('BR')
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Runtime configuration, built once at startup and handed to every collaborator.
 */
export interface AppConfig {
  readonly nodeEnv: EnvConfig['NODE_ENV'];
  readonly port: number;
  readonly siteUrl: string;
  readonly mongoUri: string;
  readonly session: {
    readonly secret: string;
    readonly maxAgeMs: number;
  };
  /**
   * Accepted admin tokens, current first. Empty when administrative endpoints are disabled.
   */
  readonly adminTokens: readonly string[];
  readonly assetStore: {
    readonly url?: string;
    readonly token?: string;
    /**
     * Base for public asset links. Falls back to the store URL.
     */
    readonly publicUrl?: string;
    readonly localDirectory: string;
  };
  readonly maxUploadBytes: number;
  readonly music: {
    readonly clientId?: string;
    readonly clientSecret?: string;
    readonly tokenUrl: string;
    readonly apiBase: string;
    readonly market: string;
  };
}

/**
 * Parse environment variables into an {@link AppConfig}.
 *
 * @param source - Variables to read, defaults to `process.env`
 * @throws Error when required variables are missing or malformed
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    throw new Error('Failed to parse environment variables');
  }

  const env = parsed.data;
  const adminTokens = [env.ADMIN_API_TOKEN, env.ADMIN_API_TOKEN_PREVIOUS].filter(
    (token): token is string => typeof token === 'string'
  );

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    siteUrl: env.SITE_URL,
    mongoUri: env.MONGODB_URI,
    session: Object.freeze({
      secret: env.SESSION_SECRET,
      maxAgeMs: env.SESSION_MAX_AGE_MS
    }),
    adminTokens: Object.freeze(adminTokens),
    assetStore: Object.freeze({
      url: env.ASSET_STORE_URL,
      token: env.ASSET_STORE_TOKEN,
      publicUrl: env.ASSET_PUBLIC_URL ?? env.ASSET_STORE_URL,
      localDirectory: env.LOCAL_UPLOAD_DIR
    }),
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    music: Object.freeze({
      clientId: env.MUSIC_CLIENT_ID,
      clientSecret: env.MUSIC_CLIENT_SECRET,
      tokenUrl: env.MUSIC_TOKEN_URL,
      apiBase: env.MUSIC_API_BASE,
      market: env.MUSIC_MARKET
    })
  });
}

/**
 * List optional collaborator settings that are absent.
 *
 * The service still starts without them; the affected feature degrades.
 */
export function findMissingOptionalConfig(config: AppConfig): string[] {
  const missing: string[] = [];

  if (!config.assetStore.url) {
    missing.push('ASSET_STORE_URL (uploads are written to local disk)');
  } else if (!config.assetStore.token) {
    missing.push('ASSET_STORE_TOKEN');
  }
  if (!config.music.clientId || !config.music.clientSecret) {
    missing.push('MUSIC_CLIENT_ID / MUSIC_CLIENT_SECRET (music search disabled)');
  }
  if (config.adminTokens.length === 0) {
    missing.push('ADMIN_API_TOKEN (administrative endpoints disabled)');
  }

  return missing;
}

/**
 * Log a warning for every absent optional setting.
 */
export function reportMissingConfig(config: AppConfig, logger: ILogger): void {
  for (const entry of findMissingOptionalConfig(config)) {
    logger.warn({ setting: entry }, 'Optional configuration missing');
  }
}
