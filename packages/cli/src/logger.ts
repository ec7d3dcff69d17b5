/**
 * Debug logger for searchdeploy
 * Writes debug output to .searchdeploy/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import { OrchestrationError } from './errors';

const SEARCHDEPLOY_DIR = '.searchdeploy';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const override = process.env.SEARCHDEPLOY_DEBUG_LOG;
    if (override) {
      fs.mkdirSync(path.dirname(override), { recursive: true });
      logFilePath = override;
      return logFilePath;
    }

    // Try local .searchdeploy first, fall back to home directory
    const localDir = path.join(process.cwd(), SEARCHDEPLOY_DIR);
    const homeDir = path.join(homedir(), SEARCHDEPLOY_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      if (!fs.existsSync(homeDir)) {
        fs.mkdirSync(homeDir, { recursive: true });
      }
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

/**
 * Rotate an oversized log and write the session header, once per process
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();

  try {
    if (fs.existsSync(logPath)) {
      const stats = fs.statSync(logPath);
      if (stats.size > MAX_LOG_SIZE) {
        const backupPath = logPath + '.old';
        if (fs.existsSync(backupPath)) {
          fs.unlinkSync(backupPath);
        }
        fs.renameSync(logPath, backupPath);
      }
    }
  } catch {
    // keep the current file
  }

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  const header = `\n${separator}\n[${timestamp}] searchdeploy session started\n${separator}\n`;

  try {
    fs.appendFileSync(logPath, header);
  } catch {
    // ignore
  }
}

/**
 * Format a log entry
 */
function formatEntry(level: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

/**
 * Append one entry to the debug log
 */
function writeLog(level: string, message: string, data?: unknown): void {
  initSession();
  const entry = formatEntry(level, message, data);

  try {
    fs.appendFileSync(getLogPath(), entry);
  } catch {
    // ignore
  }
}

/**
 * Log an info message
 */
export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

/**
 * Log a warning
 */
export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

/**
 * Log an error message
 */
export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

/**
 * Log a debug message (verbose)
 */
export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log an external command line before it is started
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type.toUpperCase(), output.trim());
  }
}

/**
 * Log a full error with the stage it happened in. Taxonomy errors also
 * record their code and the external tool's output.
 */
export function logFullError(stage: string, error: unknown): void {
  const errorData: Record<string, unknown> = { stage };

  if (error instanceof OrchestrationError) {
    errorData.code = error.code;
    errorData.diagnostics = error.diagnostics;
    errorData.remediation = error.remediation;
  }

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${stage}`, errorData);
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  command(cmd: string, args?: Record<string, unknown>): void;
}

/**
 * Create a logger scoped to one component
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
