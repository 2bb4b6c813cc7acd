/**
 * Compose Service
 * Thin bridge to the container backend (docker compose) for status and logs.
 */

import { spawn as nodeSpawn, type SpawnOptions } from 'child_process';
import * as readline from 'readline';
import type { Readable } from 'stream';
import { BackendInvocationError, BackendMissingError } from '../errors';
import { createCommandLogger, logOutput, type CommandLogger } from '../logger';

/**
 * The parts of a ChildProcess the bridge relies on
 */
export interface BackendProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnBackend = (command: string, args: string[], options: SpawnOptions) => BackendProcess;

export interface ComposeBridgeOptions {
  command?: string;
  args?: string[];
  cwd?: string;
  spawn?: SpawnBackend;
  logger?: CommandLogger;
}

export interface RunningService {
  name: string;
  /** The row as the backend printed it */
  line: string;
}

export interface StatusReport {
  output: string;
  services: RunningService[];
}

export interface StreamLogsOptions {
  service?: string;
  follow?: boolean;
  signal?: AbortSignal;
}

export interface RuntimeBridge {
  checkAvailable(): Promise<string>;
  getStatus(): Promise<RunningService[]>;
  getStatusReport(): Promise<StatusReport>;
  streamLogs(options?: StreamLogsOptions): AsyncIterable<string>;
}

interface ExitResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

function waitForExit(child: BackendProcess): Promise<ExitResult> {
  return new Promise((resolve) => {
    child.once('error', (error) => resolve({ code: null, signal: null, error }));
    child.once('close', (code, signal) => resolve({ code, signal }));
  });
}

function gather(stream: Readable | null): () => string {
  const chunks: string[] = [];
  if (stream) {
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => chunks.push(chunk));
  }
  return () => chunks.join('');
}

function isNotFound(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Rows of `docker compose ps` output. The header row and blank lines are
 * dropped, so a header-only table means nothing is running.
 */
export function parseStatusOutput(output: string): RunningService[] {
  const lines = output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);

  const rows = lines.length > 0 && /^NAME\s/.test(lines[0]) ? lines.slice(1) : lines;

  return rows.map((line) => ({ name: line.trim().split(/\s+/)[0], line }));
}

export function createComposeBridge(options: ComposeBridgeOptions = {}): RuntimeBridge {
  const command = options.command ?? 'docker';
  const baseArgs = options.args ?? ['compose'];
  const cwd = options.cwd ?? process.cwd();
  const spawn: SpawnBackend = options.spawn ?? ((cmd, args, spawnOptions) => nodeSpawn(cmd, args, spawnOptions));
  const logger = options.logger ?? createCommandLogger('backend');

  function describe(args: string[]): string {
    return [command, ...args].join(' ');
  }

  function assertSucceeded(result: ExitResult, commandLine: string, stderr: string): void {
    if (result.error) {
      if (isNotFound(result.error)) {
        throw new BackendMissingError(command);
      }
      throw new BackendInvocationError(commandLine, null, stderr || result.error.message);
    }
    if (result.code !== 0) {
      throw new BackendInvocationError(commandLine, result.code, stderr);
    }
  }

  async function run(subcommand: string[]): Promise<string> {
    const args = [...baseArgs, ...subcommand];
    const commandLine = describe(args);
    logger.command(commandLine, { cwd });

    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const exit = waitForExit(child);
    const stdout = gather(child.stdout);
    const stderr = gather(child.stderr);

    const result = await exit;
    logOutput('stdout', stdout());
    logOutput('stderr', stderr());
    assertSucceeded(result, commandLine, stderr());

    return stdout();
  }

  async function* streamLogs(streamOptions: StreamLogsOptions = {}): AsyncGenerator<string> {
    const { service, follow = false, signal } = streamOptions;
    const args = [...baseArgs, 'logs'];
    if (follow) args.push('-f');
    if (service) args.push(service);

    if (signal?.aborted) return;

    const commandLine = describe(args);
    logger.command(commandLine, { cwd, follow });

    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'], signal });
    const exit = waitForExit(child);
    const stderr = gather(child.stderr);
    const lines = child.stdout
      ? readline.createInterface({ input: child.stdout, crlfDelay: Infinity })
      : null;
    let exited = false;

    try {
      if (lines) {
        for await (const line of lines) {
          yield line;
        }
      }

      const result = await exit;
      exited = true;

      // Interrupted by the caller, not a backend failure
      if (signal?.aborted) return;

      logOutput('stderr', stderr());
      assertSucceeded(result, commandLine, stderr());
    } finally {
      lines?.close();
      if (!exited && child.exitCode === null) {
        logger.debug('Stopping log stream', { commandLine });
        child.kill('SIGTERM');
      }
    }
  }

  return {
    checkAvailable: async () => (await run(['version'])).trim(),
    getStatus: async () => parseStatusOutput(await run(['ps'])),
    getStatusReport: async () => {
      const output = await run(['ps']);
      return { output, services: parseStatusOutput(output) };
    },
    streamLogs,
  };
}
