/**
 * ConsoleLogger — leveled lines mirrored to the terminal and appended to a log file.
 *
 * INFO and WARN go to stdout, ERROR to stderr. The file copy carries no colour.
 * header()/line() only print; they are menu and banner output, not log entries.
 */

import { appendFileSync, chmodSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';
import { ConsoleError, ConsoleErrorCode } from './errors.js';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type LineWriter = (line: string) => void;

export interface LoggerOptions {
  logFile: string;
  stdout?: LineWriter;
  stderr?: LineWriter;
  now?: () => Date;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatEntry(level: LogLevel, timestamp: string, message: string): string {
  return `${`[${level}]`.padEnd(7)} ${timestamp} - ${message}`;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

/** Creates the file and its directory if needed and tightens both to owner-only, even when they already exist. */
function openLogFile(logFile: string): void {
  const dir = dirname(logFile);
  try {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
    chmodSync(dir, 0o700);
    appendFileSync(logFile, '', { mode: 0o600 });
    chmodSync(logFile, 0o600);
  } catch (err) {
    throw new ConsoleError(ConsoleErrorCode.LOG_ERROR, `Cannot open log file ${logFile}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export class ConsoleLogger {
  readonly logFile: string;
  private readonly stdout: LineWriter;
  private readonly stderr: LineWriter;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.logFile = options.logFile;
    this.stdout = options.stdout ?? (line => process.stdout.write(line + '\n'));
    this.stderr = options.stderr ?? (line => process.stderr.write(line + '\n'));
    this.now = options.now ?? (() => new Date());

    openLogFile(this.logFile);
  }

  info(msg: string): void {
    this.write('INFO', msg);
  }

  warn(msg: string): void {
    this.write('WARN', msg);
  }

  error(msg: string): void {
    this.write('ERROR', msg);
  }

  header(title: string): void {
    const rule = '='.repeat(Math.max(title.length + 8, 25));
    this.stdout(rule);
    this.stdout(chalk.bold(title.padStart(Math.floor((rule.length + title.length) / 2)).padEnd(rule.length)));
    this.stdout(rule);
  }

  line(text: string): void {
    this.stdout(text);
  }

  private write(level: LogLevel, msg: string): void {
    const entry = formatEntry(level, formatTimestamp(this.now()), msg);
    appendFileSync(this.logFile, entry + '\n');

    const colored = LEVEL_COLORS[level](entry);
    if (level === 'ERROR') {
      this.stderr(colored);
    } else {
      this.stdout(colored);
    }
  }
}

export function createLogger(options: LoggerOptions): ConsoleLogger {
  return new ConsoleLogger(options);
}
