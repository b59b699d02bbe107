/**
 * Retry policy schemas
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 10_000; // 10 seconds
export const DEFAULT_BACKOFF_MULTIPLIER = 2;

const FailureKindListSchema = z.array(z.string().min(1, 'Failure kind must not be empty'));

/**
 * Caller-facing policy input. Every field is optional; omitted fields take
 * the defaults above.
 */
export const RetryPolicyInputSchema = z
  .object({
    maxRetries: z
      .number()
      .int()
      .nonnegative()
      .optional()
      .describe('Remaining retry budget'),
    baseDelayMs: z
      .number()
      .nonnegative()
      .finite()
      .optional()
      .describe('Wait before the next retry in milliseconds'),
    backoffMultiplier: z
      .number()
      .positive()
      .finite()
      .optional()
      .describe('Factor applied to the delay after each retry'),
    transientKinds: FailureKindListSchema.optional().describe(
      'Failure kinds eligible for retry; replaces the defaults'
    ),
    additionalTransientKinds: FailureKindListSchema.optional().describe(
      'Failure kinds eligible for retry on top of the base set'
    )
  })
  .strict();

export type RetryPolicyInput = z.infer<typeof RetryPolicyInputSchema>;

export function safeParsePolicyInput(input: unknown) {
  return RetryPolicyInputSchema.safeParse(input);
}

/**
 * Format Zod errors for human readability
 */
export function formatPolicyError(error: z.ZodError): string {
  return error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('\n');
}
