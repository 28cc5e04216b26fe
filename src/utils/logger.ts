import chalk, { ChalkInstance } from 'chalk';
import { LogLevel } from '../types/index.js';

type Channel = LogLevel | 'success';

interface ChannelStyle {
  threshold: LogLevel;
  label: string;
  color: ChalkInstance;
  stream: 'stdout' | 'stderr';
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CHANNELS: Record<Channel, ChannelStyle> = {
  debug: { threshold: 'debug', label: '[DEBUG]', color: chalk.blue, stream: 'stdout' },
  info: { threshold: 'info', label: '[INFO]', color: chalk.green, stream: 'stdout' },
  success: { threshold: 'info', label: '[SUCCESS]', color: chalk.greenBright, stream: 'stdout' },
  warn: { threshold: 'warn', label: '[WARN]', color: chalk.yellow, stream: 'stdout' },
  error: { threshold: 'error', label: '[ERROR]', color: chalk.red, stream: 'stderr' },
};

let currentLevel: LogLevel = process.env.DEBUG === '1' ? 'debug' : 'info';

/**
 * Set the minimum level that gets printed
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

// "YYYY-MM-DD HH:MM:SS"
function getTimestamp(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, -5);
}

function write(channel: Channel, message: string, args: unknown[]): void {
  const style = CHANNELS[channel];
  if (LOG_LEVELS[style.threshold] < LOG_LEVELS[currentLevel]) return;

  const line = `${chalk.gray(getTimestamp())} ${style.color(style.label)} ${message}`;
  if (style.stream === 'stderr') {
    console.error(line, ...args);
  } else {
    console.log(line, ...args);
  }
}

/**
 * Verbose detail: probe attempts, request URLs, file paths
 */
export function debug(message: string, ...args: unknown[]): void {
  write('debug', message, args);
}

export function info(message: string, ...args: unknown[]): void {
  write('info', message, args);
}

/**
 * Skipped regions and endpoints
 */
export function warn(message: string, ...args: unknown[]): void {
  write('warn', message, args);
}

/**
 * Failures that abort the run, and unexpected errors
 */
export function error(message: string, ...args: unknown[]): void {
  write('error', message, args);
}

export function success(message: string, ...args: unknown[]): void {
  write('success', message, args);
}

export default {
  debug,
  info,
  warn,
  error,
  success,
  setLogLevel,
  getLogLevel,
};
