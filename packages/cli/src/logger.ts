/**
 * Debug logger for n8n-setup
 * Writes debug output to .n8n-setup/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

export const SETUP_DIR = '.n8n-setup';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD' | 'STDOUT' | 'STDERR';

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Get the debug log file path. The directory is created on the first write.
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const localDir = path.join(process.cwd(), SETUP_DIR);
    const homeDir = path.join(homedir(), SETUP_DIR);

    logFilePath = path.join(fs.existsSync(localDir) ? localDir : homeDir, DEBUG_LOG_FILE);
  }
  return logFilePath;
}

/**
 * Point the logger at a specific file. Passing null restores lookup
 * relative to the working directory on the next write.
 */
export function setLogPath(filePath: string | null): void {
  logFilePath = filePath;
  sessionStarted = false;
}

function rotateIfTooLarge(logPath: string): void {
  if (!fs.existsSync(logPath)) return;
  if (fs.statSync(logPath).size <= MAX_LOG_SIZE) return;

  const backupPath = logPath + '.old';
  if (fs.existsSync(backupPath)) {
    fs.unlinkSync(backupPath);
  }
  fs.renameSync(logPath, backupPath);
}

function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const separator = '='.repeat(80);
  const header = `\n${separator}\n[${new Date().toISOString()}] n8n-setup session started (${process.argv.slice(2).join(' ') || 'no arguments'})\n${separator}\n`;

  try {
    const logPath = getLogPath();
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    rotateIfTooLarge(logPath);
    fs.appendFileSync(logPath, header);
  } catch {
    // The debug log is best effort
  }
}

export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  let entry = `[${new Date().toISOString()}] [${level}] ${message}`;

  if (data === undefined) {
    return entry + '\n';
  }

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (typeof data === 'object' && data !== null) {
    try {
      entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
    } catch {
      entry += '\n  Data: [Could not serialize]';
    }
  } else {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  initSession();

  try {
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch {
    // Never interrupt a command because the log is unwritable
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log a backend invocation
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type === 'stdout' ? 'STDOUT' : 'STDERR', output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorName = error.name;
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    if ('code' in error) {
      errorData.errorCode = error.code;
    }
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  command(cmd: string, args?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
    command: (cmd, args) => logCommand(`[${commandName}] ${cmd}`, args),
  };
}
