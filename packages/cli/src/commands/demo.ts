/**
 * Demo command - Run the flaky operation under retry
 */

import type { Logger, RetryPolicyInput } from '@retrykit/core';
import { createRetryPolicy, match, type Operation, retry } from '@retrykit/runtime';
import chalk from 'chalk';
import { type Command, InvalidArgumentError } from 'commander';
import { loadPolicyConfig, mergePolicyInput } from '../config.js';
import { createFlakyOperation } from '../flaky.js';
import { createCliLogger, resolveLogLevel } from '../logger.js';

type DemoOptions = {
  maxRetries?: number;
  baseDelay?: number;
  multiplier?: number;
  transient?: string[];
  only?: string[];
  config?: string;
  logLevel?: string;
};

/**
 * Seams for tests and embedding; defaults run the real demo
 */
export type DemoDependencies = {
  operation?: Operation<string>;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  cwd?: string;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function flagPolicyInput(options: DemoOptions): RetryPolicyInput {
  return {
    maxRetries: options.maxRetries,
    baseDelayMs: options.baseDelay,
    backoffMultiplier: options.multiplier,
    transientKinds: options.only,
    additionalTransientKinds: options.transient
  };
}

export async function runDemo(options: DemoOptions, deps: DemoDependencies = {}): Promise<boolean> {
  const logger: Logger = deps.logger ?? createCliLogger({ level: resolveLogLevel(options.logLevel) });

  const fileInput = options.config ? await loadPolicyConfig(options.config, deps.cwd) : {};
  const policy = createRetryPolicy(mergePolicyInput(fileInput, flagPolicyInput(options)));

  logger.info(
    {
      maxRetries: policy.maxRetries,
      baseDelayMs: policy.baseDelayMs,
      backoffMultiplier: policy.backoffMultiplier,
      transientKinds: [...policy.transientKinds]
    },
    'Running flaky operation'
  );

  let attempts = 1;
  const outcome = await retry(deps.operation ?? createFlakyOperation(), policy, {
    logger,
    sleep: deps.sleep,
    onRetry: () => {
      attempts++;
    }
  });

  return match(outcome, {
    ok: (value) => {
      console.log(chalk.green(value));
      return true;
    },
    err: (failure) => {
      const plural = attempts === 1 ? '' : 's';
      console.log(
        chalk.red(`Failed after ${attempts} attempt${plural}: ${failure.kind}: ${failure.message}`)
      );
      return false;
    }
  });
}

export function setupDemoCommand(program: Command, deps: DemoDependencies = {}): void {
  program
    .command('demo')
    .description('Run a flaky operation under retry with backoff')
    .option('-r, --max-retries <n>', 'retry budget', parseNumber)
    .option('-d, --base-delay <ms>', 'wait before the first retry in milliseconds', parseNumber)
    .option('-m, --multiplier <x>', 'backoff multiplier', parseNumber)
    .option('-t, --transient <kinds...>', 'failure kinds to retry on top of the defaults')
    .option('--only <kinds...>', 'failure kinds to retry instead of the defaults')
    .option('-c, --config <path>', 'path to a JSON or JSONC policy file')
    .option('-l, --log-level <level>', 'log level (silent, error, warn, info, debug, trace)')
    .action(async (options: DemoOptions) => {
      const succeeded = await runDemo(options, deps);
      if (!succeeded) {
        process.exitCode = 1;
      }
    });
}
