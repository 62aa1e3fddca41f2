import { createHmac } from 'crypto';
import { ConfigurationError } from '../common/errors/configuration.error';
import { BuilderCredentials } from '../config/dashboard.config';

export interface SignedRequest {
  method: string;
  path: string;           // request path without query string
  body?: string;
  timestamp?: number;     // unix seconds, defaults to now
}

export type BuilderHeaders = {
  POLY_BUILDER_API_KEY: string;
  POLY_BUILDER_PASSPHRASE: string;
  POLY_BUILDER_SIGNATURE: string;
  POLY_BUILDER_TIMESTAMP: string;
};

/**
 * HMAC-SHA256 over `timestamp + METHOD + path + body`, keyed with the
 * base64-decoded secret and encoded as url-safe base64.
 */
export function signBuilderRequest(secret: string, message: string): string {
  return createHmac('sha256', Buffer.from(secret, 'base64'))
    .update(message)
    .digest('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/**
 * Builds the builder auth headers for one outbound request.
 * @throws ConfigurationError if any credential is empty
 */
export function buildBuilderHeaders(
  credentials: BuilderCredentials,
  request: SignedRequest,
): BuilderHeaders {
  const { key, secret, passphrase } = credentials;
  if (!key || !secret || !passphrase) {
    throw new ConfigurationError('Builder API key, secret and passphrase are all required');
  }

  const timestamp = request.timestamp ?? Math.floor(Date.now() / 1000);
  const message = `${timestamp}${request.method.toUpperCase()}${request.path}${request.body ?? ''}`;

  return {
    POLY_BUILDER_API_KEY: key,
    POLY_BUILDER_PASSPHRASE: passphrase,
    POLY_BUILDER_SIGNATURE: signBuilderRequest(secret, message),
    POLY_BUILDER_TIMESTAMP: String(timestamp),
  };
}
