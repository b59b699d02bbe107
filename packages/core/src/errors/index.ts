/**
 * Error system exports for RetryKit
 *
 * These errors describe misuse of the toolkit itself (bad policy values,
 * unreadable config files). Failures raised by retried operations never
 * become a RetryKitError; they are folded into an Outcome instead.
 */

import { ErrorCode, type ErrorContext } from './codes.js';

export { ErrorCode, type ErrorContext } from './codes.js';

export class RetryKitError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'RetryKitError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export const isRetryKitError = (error: unknown): error is RetryKitError =>
  error instanceof RetryKitError;

export const ErrorHelpers = {
  invalidPolicy: (details: string) =>
    new RetryKitError(ErrorCode.E_POLICY_INVALID, `Invalid retry policy:\n${details}`),

  configNotFound: (configPath: string) =>
    new RetryKitError(ErrorCode.E_CONFIG_NOT_FOUND, `Config file not found: ${configPath}`, {
      configPath
    }),

  configParseFailed: (configPath: string, details: string) =>
    new RetryKitError(
      ErrorCode.E_CONFIG_PARSE_ERROR,
      `Failed to parse config file ${configPath}: ${details}`,
      { configPath }
    ),

  invalidConfig: (configPath: string, details: string) =>
    new RetryKitError(ErrorCode.E_CONFIG_INVALID, `Invalid config file ${configPath}:\n${details}`, {
      configPath
    })
};
