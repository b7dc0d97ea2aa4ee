import {
  ConnectionType,
  DEFAULT_LOGIN_URL,
  OAUTH_ENV_VARS,
  PASSWORD_ENV_VARS,
  type Credentials,
  type SalesforceEnv,
} from '../types/connection.js';
import type { SalesforceClient } from '../types/salesforce.js';
import { ConfigurationError } from './errorHandler.js';

/**
 * Builds clients for each credential type
 */
export interface SalesforceConnector {
  /** Wrap an existing session; performs no network call */
  fromAccessToken(instanceUrl: string, accessToken: string): SalesforceClient;
  /** Log in once against the login endpoint */
  login(loginUrl: string, username: string, password: string): Promise<SalesforceClient>;
}

function readEnv(env: SalesforceEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Pick credentials from the environment. An access token with an instance URL
 * wins over username/password/security token.
 */
export function resolveCredentials(env: SalesforceEnv): Credentials {
  const accessToken = readEnv(env, 'SALESFORCE_ACCESS_TOKEN');
  const instanceUrl = readEnv(env, 'SALESFORCE_INSTANCE_URL');

  if (accessToken && instanceUrl) {
    return {
      kind: ConnectionType.OAuth_Access_Token,
      accessToken,
      instanceUrl,
    };
  }

  const username = readEnv(env, 'SALESFORCE_USERNAME');
  const password = readEnv(env, 'SALESFORCE_PASSWORD');
  const securityToken = readEnv(env, 'SALESFORCE_SECURITY_TOKEN');

  if (username && password && securityToken) {
    return {
      kind: ConnectionType.User_Password,
      username,
      password,
      securityToken,
      loginUrl: readEnv(env, 'SALESFORCE_LOGIN_URL') ?? DEFAULT_LOGIN_URL,
    };
  }

  const missingPassword = PASSWORD_ENV_VARS.filter((name) => !readEnv(env, name));
  const startedPassword = missingPassword.length < PASSWORD_ENV_VARS.length;

  if (startedPassword) {
    throw new ConfigurationError(
      `Incomplete username/password credentials. Missing: ${missingPassword.join(', ')}`,
      missingPassword
    );
  }

  const missingOAuth = OAUTH_ENV_VARS.filter((name) => !readEnv(env, name));
  const missing = [...missingOAuth, ...missingPassword];
  throw new ConfigurationError(
    `No Salesforce credentials configured. Set ${OAUTH_ENV_VARS.join(' and ')}, ` +
      `or ${PASSWORD_ENV_VARS.join(', ')}. Missing: ${missing.join(', ')}`,
    missing
  );
}

/**
 * Create a connected client for the given credentials
 */
export async function connect(
  credentials: Credentials,
  connector: SalesforceConnector
): Promise<SalesforceClient> {
  switch (credentials.kind) {
    case ConnectionType.OAuth_Access_Token:
      return connector.fromAccessToken(credentials.instanceUrl, credentials.accessToken);

    case ConnectionType.User_Password:
      return await connector.login(
        credentials.loginUrl,
        credentials.username,
        credentials.password + credentials.securityToken
      );
  }
}
