import config from '../config';
import logger from '../utils/logger';

export interface OpenSkyCredentialOptions {
  username?: string;
  password?: string;
  clientId?: string;
  clientSecret?: string;
  tokenUrl?: string;
  scope?: string;
  /** Fill missing values from OPENSKY_* environment variables (default true) */
  useEnvCredentials?: boolean;
}

export type OpenSkyAuth =
  | {
    kind: 'oauth2';
    clientId: string;
    clientSecret: string;
    tokenUrl: string;
    scope?: string;
  }
  | { kind: 'basic'; username: string; password: string }
  | { kind: 'anonymous' };

const pick = (explicit: string | undefined, fallback: string | undefined): string | undefined => (
  explicit || fallback || undefined
);

/**
 * Decide how to authenticate against OpenSky.
 * OAuth2 client credentials take precedence over legacy basic auth;
 * with neither, requests go out anonymously (and are rate-limited harder).
 */
export function resolveOpenSkyAuth(
  options: OpenSkyCredentialOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): OpenSkyAuth {
  const fromEnv = options.useEnvCredentials !== false;
  const read = (name: string): string | undefined => (fromEnv ? env[name] : undefined);

  const clientId = pick(options.clientId, read('OPENSKY_CLIENT_ID'));
  const clientSecret = pick(options.clientSecret, read('OPENSKY_CLIENT_SECRET'));
  const tokenUrl = pick(options.tokenUrl, read('OPENSKY_TOKEN_URL'));
  const scope = pick(options.scope, read('OPENSKY_SCOPE'));
  const username = pick(options.username, read('OPENSKY_USERNAME'));
  const password = pick(options.password, read('OPENSKY_PASSWORD'));

  if (clientId && clientSecret) {
    logger.info('Using OAuth2 client credentials for OpenSky API');
    return {
      kind: 'oauth2',
      clientId,
      clientSecret,
      tokenUrl: tokenUrl || config.external.opensky.tokenUrl,
      ...(scope && { scope }),
    };
  }

  if (username && password) {
    logger.info('Using legacy basic auth for OpenSky API');
    return { kind: 'basic', username, password };
  }

  logger.info('Using anonymous access for OpenSky API (rate-limited)');
  return { kind: 'anonymous' };
}
