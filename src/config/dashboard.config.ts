import { ConfigurationError } from '../common/errors/configuration.error';

export const DASHBOARD_CONFIG = Symbol('DASHBOARD_CONFIG');

export interface BuilderCredentials {
  key: string;
  secret: string;
  passphrase: string;
}

export interface UpstreamOptions {
  host: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxPages: number;
}

// Built once at startup and injected read-only everywhere.
export interface DashboardConfig {
  port: number;
  credentials: Readonly<BuilderCredentials>;
  upstream: Readonly<UpstreamOptions>;
}

const REQUIRED_SECRETS = ['BUILDER_API_KEY', 'BUILDER_SECRET', 'BUILDER_PASS_PHRASE'] as const;

const DEFAULT_CLOB_HOST = 'https://clob.polymarket.com';

// Standard or url-safe alphabet, optional padding.
const BASE64 = /^[A-Za-z0-9+/_-]+={0,2}$/;

function readSecret(env: NodeJS.ProcessEnv): string {
  const secret = env.BUILDER_SECRET?.trim() ?? '';
  const unpadded = secret.replace(/=+$/, '');
  if (!BASE64.test(secret) || unpadded.length % 4 === 1) {
    throw new ConfigurationError('BUILDER_SECRET must be base64-encoded');
  }
  return secret;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Reads the process environment into an immutable config.
 * @throws ConfigurationError when a builder secret is missing, the secret is not base64 or a number is malformed
 */
export function loadDashboardConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const missing = REQUIRED_SECRETS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const host = (env.CLOB_HOST?.trim() || DEFAULT_CLOB_HOST).replace(/\/+$/, '');

  return Object.freeze({
    port: readInteger(env, 'PORT', 3000, 1),
    credentials: Object.freeze({
      key: env.BUILDER_API_KEY?.trim() ?? '',
      secret: readSecret(env),
      passphrase: env.BUILDER_PASS_PHRASE?.trim() ?? '',
    }),
    upstream: Object.freeze({
      host,
      timeoutMs: readInteger(env, 'UPSTREAM_TIMEOUT_MS', 10_000, 1),
      maxRetries: readInteger(env, 'UPSTREAM_MAX_RETRIES', 2, 0),
      retryDelayMs: readInteger(env, 'UPSTREAM_RETRY_DELAY_MS', 250, 0),
      maxPages: readInteger(env, 'UPSTREAM_MAX_PAGES', 100, 1),
    }),
  });
}
