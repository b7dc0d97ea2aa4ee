/**
 * Enum representing the available Salesforce connection types
 */
export enum ConnectionType {
  /**
   * OAuth access token issued elsewhere, used as-is
   * Requires SALESFORCE_ACCESS_TOKEN and SALESFORCE_INSTANCE_URL
   */
  OAuth_Access_Token = 'OAuth_Access_Token',

  /**
   * Standard username/password authentication with security token
   * Requires SALESFORCE_USERNAME, SALESFORCE_PASSWORD and SALESFORCE_SECURITY_TOKEN
   */
  User_Password = 'User_Password',
}

export const DEFAULT_LOGIN_URL = 'https://login.salesforce.com';

export const OAUTH_ENV_VARS = ['SALESFORCE_ACCESS_TOKEN', 'SALESFORCE_INSTANCE_URL'] as const;

export const PASSWORD_ENV_VARS = [
  'SALESFORCE_USERNAME',
  'SALESFORCE_PASSWORD',
  'SALESFORCE_SECURITY_TOKEN',
] as const;

export interface OAuthCredentials {
  kind: ConnectionType.OAuth_Access_Token;
  /** Access token for API calls */
  accessToken: string;
  /** Salesforce instance URL */
  instanceUrl: string;
}

export interface PasswordCredentials {
  kind: ConnectionType.User_Password;
  username: string;
  password: string;
  securityToken: string;
  /**
   * The login URL for the Salesforce instance
   * @default 'https://login.salesforce.com'
   */
  loginUrl: string;
}

export type Credentials = OAuthCredentials | PasswordCredentials;

/**
 * Environment variables the server reads. Values may be unset or empty.
 */
export type SalesforceEnv = Partial<Record<string, string>>;

/**
 * Options applied to every connection regardless of credential type
 */
export interface ConnectionOptions {
  /** API version such as "61.0"; jsforce picks its default when omitted */
  version?: string;
}
