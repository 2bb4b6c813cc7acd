/**
 * Terminal capability checks
 */

export interface TerminalStreams {
  stdin: { isTTY?: boolean };
  stdout: { isTTY?: boolean };
}

/**
 * Prompts need a TTY on both ends. CI runners are treated as
 * non-interactive even when they allocate a pseudo terminal.
 */
export function isInteractive(
  streams: TerminalStreams = process,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.CI && env.CI !== 'false' && env.CI !== '0') {
    return false;
  }
  return Boolean(streams.stdin.isTTY && streams.stdout.isTTY);
}
