/**
 * Policy configuration loader
 *
 * Loads a retry policy input from a JSON or JSONC file and merges it with
 * command-line overrides. Uses Zod (via @retrykit/core) for validation.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import {
  ErrorHelpers,
  formatPolicyError,
  type RetryPolicyInput,
  safeParsePolicyInput
} from '@retrykit/core';
import { type ParseError, parse, printParseErrorCode } from 'jsonc-parser';

/**
 * Load and validate a policy file
 */
export async function loadPolicyConfig(
  configPath: string,
  cwd: string = process.cwd()
): Promise<RetryPolicyInput> {
  const absolutePath = isAbsolute(configPath) ? configPath : resolve(cwd, configPath);

  if (!existsSync(absolutePath)) {
    throw ErrorHelpers.configNotFound(absolutePath);
  }

  const content = await readFile(absolutePath, 'utf-8');
  const errors: ParseError[] = [];
  const data: unknown = parse(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${printParseErrorCode(error.error)} at offset ${error.offset}`)
      .join(', ');
    throw ErrorHelpers.configParseFailed(absolutePath, details);
  }

  const parsed = safeParsePolicyInput(data);
  if (!parsed.success) {
    throw ErrorHelpers.invalidConfig(absolutePath, formatPolicyError(parsed.error));
  }

  return parsed.data;
}

/**
 * Overlay defined fields of `overrides` on `base`
 */
export function mergePolicyInput(
  base: RetryPolicyInput,
  overrides: RetryPolicyInput
): RetryPolicyInput {
  const merged: RetryPolicyInput = { ...base };
  if (overrides.maxRetries !== undefined) merged.maxRetries = overrides.maxRetries;
  if (overrides.baseDelayMs !== undefined) merged.baseDelayMs = overrides.baseDelayMs;
  if (overrides.backoffMultiplier !== undefined) {
    merged.backoffMultiplier = overrides.backoffMultiplier;
  }
  if (overrides.transientKinds !== undefined) merged.transientKinds = overrides.transientKinds;
  if (overrides.additionalTransientKinds !== undefined) {
    merged.additionalTransientKinds = overrides.additionalTransientKinds;
  }
  return merged;
}
