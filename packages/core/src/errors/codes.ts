/**
 * Error codes and context for RetryKit
 */

export const ErrorCode = {
  // Retry policy
  E_POLICY_INVALID: 'E_POLICY_INVALID',

  // Configuration files
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',
  E_CONFIG_NOT_FOUND: 'E_CONFIG_NOT_FOUND',
  E_CONFIG_PARSE_ERROR: 'E_CONFIG_PARSE_ERROR'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorContext = {
  configPath?: string;
  field?: string;
  [key: string]: unknown;
};
