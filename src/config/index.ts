import dotenv from 'dotenv';

dotenv.config();

export interface HttpSettings {
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
}

export interface OAuthSettings {
  callbackUrl: string;
  stateTtlSeconds: number;
  refreshMarginSeconds: number;
  // Empty list: any http(s) origin may be used as a post-connect redirect
  allowedRedirectOrigins: string[];
}

export interface GoogleSettings {
  clientId: string;
  clientSecret: string;
  gmailEnabled: boolean;
}

export interface AnthropicSettings {
  // Empty: email summaries are skipped
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  apiBaseUrl: string;
  databaseUrl: string;
  redisUrl: string;
  jwtSecret: string;
  encryptionKey: string;
  corsOrigins: string[];
  http: HttpSettings;
  oauth: OAuthSettings;
  google: GoogleSettings;
  anthropic: AnthropicSettings;
}

type Env = Record<string, string | undefined>;

function parseIntOr(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseJsonArray(raw: string): unknown[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return Array.isArray(parsed) ? parsed : null;
}

/**
 * Accepts either a JSON array or a comma-separated string.
 */
export function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    const parsed = parseJsonArray(trimmed);
    if (parsed) {
      return parsed.map((item) => String(item).trim()).filter(Boolean);
    }
  }

  return trimmed.split(',').map((item) => item.trim()).filter(Boolean);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the configuration struct once at startup. Components get it (or the
 * slice they need) through their constructors and never mutate it.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const apiBaseUrl = (env.API_BASE_URL || 'http://localhost:3000').replace(/\/$/, '');

  return deepFreeze({
    // Server
    nodeEnv: env.NODE_ENV || 'development',
    port: parseIntOr(env.PORT, 3000),
    apiBaseUrl,

    // Database
    databaseUrl: env.DATABASE_URL || '',

    // Redis
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',

    // JWT auth (owner identity)
    jwtSecret: env.JWT_SECRET || '',

    // Encryption (for OAuth tokens)
    encryptionKey: env.ENCRYPTION_KEY || '',

    corsOrigins: parseList(env.CORS_ORIGINS),

    // Upstream HTTP policy
    http: {
      timeoutMs: parseIntOr(env.HTTP_TIMEOUT_MS, 10_000),
      retries: parseIntOr(env.HTTP_RETRIES, 2),
      retryBackoffMs: parseIntOr(env.HTTP_RETRY_BACKOFF_MS, 350),
    },

    // OAuth flow
    oauth: {
      callbackUrl: env.OAUTH_CALLBACK_URL || `${apiBaseUrl}/api/v1/integrations/callback`,
      stateTtlSeconds: parseIntOr(env.OAUTH_STATE_TTL_SECONDS, 15 * 60),
      refreshMarginSeconds: parseIntOr(env.TOKEN_REFRESH_MARGIN_SECONDS, 60),
      allowedRedirectOrigins: parseList(env.OAUTH_ALLOWED_REDIRECT_ORIGINS),
    },

    // Google OAuth
    google: {
      clientId: env.GOOGLE_CLIENT_ID || '',
      clientSecret: env.GOOGLE_CLIENT_SECRET || '',
      gmailEnabled: parseBool(env.GMAIL_ENABLED, true),
    },

    // Claude (email summaries)
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || '',
      model: env.ANTHROPIC_MODEL || 'claude-3-5-haiku-latest',
      timeoutMs: parseIntOr(env.ANTHROPIC_TIMEOUT_MS, 20_000),
      maxRetries: parseIntOr(env.ANTHROPIC_MAX_RETRIES, 1),
    },
  });
}

/**
 * Returns the names of required env vars that are not set.
 */
export function validateConfig(env: Env = process.env): string[] {
  const required = ['DATABASE_URL', 'ENCRYPTION_KEY', 'JWT_SECRET'];
  return required.filter((key) => !env[key]);
}

export const config = loadConfig();

export default config;
