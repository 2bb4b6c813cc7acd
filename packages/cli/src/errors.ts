/**
 * Error types for n8n-setup
 *
 * Every failure a command can end with is one of these. Each carries a
 * stable code for the debug log and the process exit code it maps to.
 */

import chalk from 'chalk';
import { logFullError } from './logger';

export type SetupErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INTERACTION_UNAVAILABLE'
  | 'SETUP_FAILURE'
  | 'BACKEND_MISSING'
  | 'BACKEND_INVOCATION_ERROR';

export class SetupError extends Error {
  readonly code: SetupErrorCode;
  readonly exitCode: number;

  constructor(message: string, code: SetupErrorCode, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * A service id, preset or config value that does not exist in the catalog
 * or does not match the config schema.
 */
export class ConfigurationError extends SetupError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 2);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a prompt cannot run. Callers recover by falling back to the
 * default answer; it never reaches the user as a failure.
 */
export class InteractionUnavailableError extends SetupError {
  constructor(message = 'Interactive input is not available') {
    super(message, 'INTERACTION_UNAVAILABLE', 1);
    this.name = 'InteractionUnavailableError';
  }
}

export class SetupFailure extends SetupError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    super(`Setup step failed: ${step} (${describeCause(cause)})`, 'SETUP_FAILURE', 1, { cause });
    this.name = 'SetupFailure';
    this.step = step;
  }
}

export class BackendMissingError extends SetupError {
  readonly command: string;

  constructor(command: string) {
    super(`${command} not found on PATH`, 'BACKEND_MISSING', 127);
    this.name = 'BackendMissingError';
    this.command = command;
  }
}

export class BackendInvocationError extends SetupError {
  readonly backendExitCode: number | null;
  readonly stderr: string;

  constructor(commandLine: string, backendExitCode: number | null, stderr: string) {
    super(
      `${commandLine} exited with ${backendExitCode === null ? 'a signal' : `code ${backendExitCode}`}`,
      'BACKEND_INVOCATION_ERROR',
      1
    );
    this.name = 'BackendInvocationError';
    this.backendExitCode = backendExitCode;
    this.stderr = stderr;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isSetupError(error: unknown): error is SetupError {
  return error instanceof SetupError;
}

/**
 * Print a user-facing message for an error, record it in the debug log and
 * return the exit code the command should end with.
 *
 * Commands pass a `messages` map to word the backend errors for their own
 * context (status and logs say different things when docker is missing).
 */
export function reportError(
  error: unknown,
  context: string,
  messages: Partial<Record<SetupErrorCode, string>> = {}
): number {
  logFullError(context, error);

  if (!isSetupError(error)) {
    console.log(chalk.red(`\n  Error: ${describeCause(error)}\n`));
    return 1;
  }

  const message = messages[error.code] ?? error.message;
  console.log(chalk.red(`\n  Error: ${message}\n`));

  if (error instanceof SetupFailure) {
    console.log(chalk.gray('  Steps that already completed were left in place.\n'));
  }

  if (error instanceof BackendInvocationError && error.stderr.trim()) {
    for (const line of error.stderr.trim().split('\n')) {
      console.log(chalk.gray(`  ${line}`));
    }
    console.log('');
  }

  return error.exitCode;
}
