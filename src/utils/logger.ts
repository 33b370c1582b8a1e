import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

// stdout is reserved for the machine-readable command summary
const write = (text: string): void => {
  process.stderr.write(text.endsWith('\n') ? text : text + '\n');
};

export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);

// Duplicate message tracking
const recentMessages = new Set<string>();
const MAX_RECENT_MESSAGES = 10;
const DUPLICATE_TIMEOUT = 1000;
let clearTimer: ReturnType<typeof setTimeout> | null = null;

function clearOldMessages(): void {
  if (recentMessages.size > MAX_RECENT_MESSAGES) {
    recentMessages.clear();
  }
  if (clearTimer) {
    clearTimeout(clearTimer);
  }
  clearTimer = setTimeout(() => {
    recentMessages.clear();
    clearTimer = null;
  }, DUPLICATE_TIMEOUT);
  clearTimer.unref();
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
  allowDuplicates: boolean = true,
): void {
  if (currentVerbosity >= level) {
    if (!allowDuplicates && recentMessages.has(message)) {
      return;
    }

    write(message);

    if (!allowDuplicates) {
      recentMessages.add(message);
      clearOldMessages();
    }
  }
}

export function error(message: string): void {
  write(red(`❌ ${message}`));
}

export function warning(message: string, currentVerbosity: number): void {
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function info(message: string, currentVerbosity: number): void {
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function success(message: string, currentVerbosity: number): void {
  log(green(`✅ ${message}`), Verbosity.Normal, currentVerbosity, true);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(message, Verbosity.Verbose, currentVerbosity, true);
}

export function always(message: string): void {
  write(message);
}
