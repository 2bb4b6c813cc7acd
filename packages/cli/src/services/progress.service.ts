/**
 * Progress Service
 * Runs setup steps in order and reports each one as it starts and finishes.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { SetupFailure } from '../errors';

export interface SetupStep {
  description: string;
  work: () => Promise<void> | void;
}

export interface ProgressReporter {
  start(description: string, index: number, total: number): void;
  succeed(description: string): void;
  /** Step was reported but its work did not run (dry run) */
  skip(description: string): void;
  fail(description: string, error: unknown): void;
}

export interface RunStepsOptions {
  dryRun?: boolean;
  reporter?: ProgressReporter;
}

export interface StepRunSummary {
  completed: string[];
  dryRun: boolean;
}

/**
 * One ora spinner per step, prefixed with a [n/total] counter
 */
export function createSpinnerReporter(): ProgressReporter {
  let spinner: Ora | null = null;
  let prefix = '';

  return {
    start(description, index, total) {
      prefix = chalk.gray(`[${index + 1}/${total}]`);
      spinner = ora(`${prefix} ${description}`).start();
    },
    succeed(description) {
      spinner?.succeed(`${prefix} ${description}`);
      spinner = null;
    },
    skip(description) {
      spinner?.info(`${prefix} ${description} ${chalk.yellow('(dry run, skipped)')}`);
      spinner = null;
    },
    fail(description, error) {
      const reason = error instanceof Error ? error.message : String(error);
      spinner?.fail(`${prefix} ${description} ${chalk.red(reason)}`);
      spinner = null;
    },
  };
}

/**
 * Execute steps strictly in order. The first failing step stops the run;
 * steps that already finished are left as they are.
 */
export async function runSteps(
  steps: readonly SetupStep[],
  options: RunStepsOptions = {}
): Promise<StepRunSummary> {
  const dryRun = options.dryRun ?? false;
  const reporter = options.reporter ?? createSpinnerReporter();
  const completed: string[] = [];

  for (const [index, step] of steps.entries()) {
    reporter.start(step.description, index, steps.length);

    if (dryRun) {
      reporter.skip(step.description);
      completed.push(step.description);
      continue;
    }

    try {
      await step.work();
    } catch (error) {
      reporter.fail(step.description, error);
      throw new SetupFailure(step.description, error);
    }

    reporter.succeed(step.description);
    completed.push(step.description);
  }

  return { completed, dryRun };
}
