/**
 * Module-tagged console logger.
 *
 *   const log = createLogger('team');
 *   log.info('Coordinator ready');   // → [team] Coordinator ready
 *
 * Everything is written to stderr: in stdio mode stdout carries the MCP
 * protocol and nothing else. Arguments are passed through the sensitive
 * data filter before printing.
 */

import { redactSensitive, redactText } from '@seqthink/shared';

export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

let debugEnabled = false;

/** Toggle `debug` output for every logger (DEBUG=True). */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

function clean(args: unknown[]): unknown[] {
  return args.map((arg) => (arg instanceof Error ? arg : redactSensitive(arg)));
}

export function createLogger(module: string, options: { debug?: boolean } = {}): Logger {
  const prefix = `[${module}]`;
  return {
    debug(msg, ...args) {
      if (debugEnabled || options.debug) {
        console.error(`${prefix} ${redactText(msg)}`, ...clean(args));
      }
    },
    info(msg, ...args) {
      console.error(`${prefix} ${redactText(msg)}`, ...clean(args));
    },
    warn(msg, ...args) {
      console.error(`${prefix} WARNING: ${redactText(msg)}`, ...clean(args));
    },
    error(msg, ...args) {
      console.error(`${prefix} ERROR: ${redactText(msg)}`, ...clean(args));
    },
  };
}
