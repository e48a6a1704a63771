/**
 * Activity log: writes JSONL to daily-rotated files.
 *
 * File pattern: <LOG_FOLDER>/activity-YYYY-MM-DD.jsonl
 * Each line is a JSON-serialized ActivityEntry with sensitive values masked.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { redactSensitive, type ActivityEntry } from '@seqthink/shared';
import { createLogger } from './logger.js';

const log = createLogger('activity');

export class ActivityLog {
  private logDir: string;
  private currentDate: string = '';
  private stream: fs.WriteStream | null = null;
  private onLog: ((entry: Record<string, unknown>) => void) | null = null;

  constructor(logDir: string) {
    this.logDir = logDir;
  }

  /** Register a callback for new entries (tests and live tailing). */
  setOnLog(callback: (entry: Record<string, unknown>) => void): void {
    this.onLog = callback;
  }

  /** Ensure the log directory exists and open the initial stream. */
  init(): void {
    fs.mkdirSync(this.logDir, { recursive: true });
    this.ensureStream();
    log.info(`Writing activity logs to ${this.logDir}`);
  }

  /** Log an activity entry. */
  log(entry: ActivityEntry): void {
    const serialized: Record<string, unknown> = {
      timestamp: entry.timestamp.toISOString(),
      type: entry.type,
      sessionId: entry.sessionId,
      data: redactSensitive(entry.data),
    };

    const stream = this.ensureStream();
    stream.write(JSON.stringify(serialized) + '\n');

    if (this.onLog) {
      try {
        this.onLog(serialized);
      } catch (err) {
        log.warn('Activity listener failed:', err);
      }
    }
  }

  logThoughtReceived(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'thought_received', sessionId, data });
  }

  logTeamRequest(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'team_request', sessionId, data });
  }

  logTeamResponse(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'team_response', sessionId, data });
  }

  logDelegation(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'delegation', sessionId, data });
  }

  logToolCall(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'tool_call', sessionId, data });
  }

  logHttpRequest(requestId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'http_request', sessionId: requestId, data });
  }

  logError(sessionId: string, data: Record<string, unknown>): void {
    this.log({ timestamp: new Date(), type: 'error', sessionId, data });
  }

  /** Close the current write stream; resolves once buffered lines are flushed. */
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }

  /** Ensure we have a stream open for today's date. */
  private ensureStream(): fs.WriteStream {
    const today = new Date().toISOString().slice(0, 10);
    if (this.stream && today === this.currentDate) {
      return this.stream;
    }

    // Date rolled over (or first write): reopen
    this.stream?.end();
    fs.mkdirSync(this.logDir, { recursive: true });
    this.currentDate = today;
    const filePath = path.join(this.logDir, `activity-${today}.jsonl`);
    const stream = fs.createWriteStream(filePath, { flags: 'a' });
    stream.on('error', (err) => {
      log.error('Write error:', err.message);
    });
    this.stream = stream;
    return stream;
  }
}
