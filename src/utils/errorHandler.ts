import type { ZodError } from 'zod';
import type { SaveResult } from '../types/salesforce.js';
import type { ToolFailure } from '../types/tools.js';

/**
 * Custom error class for connection-related issues
 */
export class ConnectionError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ConnectionError';
    this.code = code;
  }
}

/**
 * Missing or incomplete credentials, detected before any network call
 */
export class ConfigurationError extends Error {
  public readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * Tool arguments that fail their schema
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnknownToolError extends Error {
  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

function readString(error: unknown, key: string): string | undefined {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

function readNumber(error: unknown, key: string): number | undefined {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return readString(error, 'message') ?? String(error);
}

/**
 * Check if error indicates token expiration or session invalidity
 */
export function isTokenExpiredError(error: unknown): boolean {
  if (!error) return false;

  const errorCode = readString(error, 'errorCode') ?? readString(error, 'name');
  if (errorCode === 'INVALID_SESSION_ID' ||
      errorCode === 'SESSION_NOT_FOUND' ||
      errorCode === 'INVALID_SESSION') {
    return true;
  }

  if (readNumber(error, 'statusCode') === 401 || readNumber(error, 'status') === 401) {
    return true;
  }

  const message = messageOf(error).toLowerCase();
  return message.includes('session expired') ||
         message.includes('invalid session') ||
         message.includes('session not found');
}

/**
 * Check if error indicates OAuth-specific issues
 */
export function isOAuthError(error: unknown): boolean {
  if (!error) return false;

  const message = messageOf(error).toLowerCase();
  return message.includes('access_denied') ||
         message.includes('invalid_grant') ||
         message.includes('invalid_client') ||
         readString(error, 'error') === 'invalid_grant' ||
         readString(error, 'error') === 'access_denied';
}

/**
 * Create user-friendly error message for authentication failures
 */
export function formatAuthenticationError(error: unknown): string {
  if (isTokenExpiredError(error)) {
    return 'Your Salesforce session has expired. Please re-authenticate to continue.';
  }

  if (isOAuthError(error)) {
    return 'OAuth authentication failed. Please check your access token and instance URL.';
  }

  const message = messageOf(error);
  if (message.includes('INVALID_LOGIN')) {
    return 'Invalid username, password, or security token. Please verify your credentials.';
  }

  return `Authentication failed: ${message || 'Unknown error'}`;
}

/**
 * Format a Salesforce API error, prefixing the Salesforce error code when present
 */
export function formatRemoteError(error: unknown): string {
  const message = messageOf(error);
  const errorCode = readString(error, 'errorCode');
  if (errorCode && !message.includes(errorCode)) {
    return `[${errorCode}] ${message}`;
  }
  return message;
}

export function formatValidationError(toolName: string, error: ZodError): string {
  const details = error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
  return `Invalid arguments for ${toolName}: ${details}`;
}

/**
 * Map anything thrown while running a tool to a typed failure
 */
export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof ConfigurationError) {
    return { kind: 'configuration', message: error.message };
  }
  if (error instanceof ConnectionError) {
    return { kind: 'connection', message: error.message };
  }
  if (error instanceof ValidationError) {
    return { kind: 'invalid_arguments', message: error.message };
  }
  if (error instanceof UnknownToolError) {
    return { kind: 'unknown_tool', message: error.message };
  }
  if (isTokenExpiredError(error)) {
    return { kind: 'connection', message: formatAuthenticationError(error) };
  }
  return { kind: 'remote', message: formatRemoteError(error) };
}

export function formatSaveError(result: SaveResult | SaveResult[], operation: string): string {
  let errorMessage = `Failed to ${operation}`;
  const saveResult = Array.isArray(result) ? result[0] : result;

  if (saveResult && saveResult.errors.length > 0) {
    errorMessage += ': ' + saveResult.errors
      .map((error) => {
        let text = error.message;
        if (error.fields && error.fields.length > 0) {
          text += ` (Field: ${error.fields.join(', ')})`;
        }
        const code = error.statusCode ?? error.errorCode;
        if (code) {
          text += ` [${code}]`;
        }
        return text;
      })
      .join(', ');
  }

  return errorMessage;
}
