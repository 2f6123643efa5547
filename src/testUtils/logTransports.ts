import type { LogTransport } from '../logging/types.js';
import { isRecord } from '../utils/guards.js';

export type LogRecord = Record<string, unknown>;

// Emulates console transport
export class MockTransport implements LogTransport {
  public logs: LogRecord[] = [];
  public errors: LogRecord[] = [];

  log(message?: unknown): void {
    this.logs.push(isRecord(message) ? message : { message });
  }

  error(message?: unknown): void {
    this.errors.push(isRecord(message) ? message : { message });
  }

  /** All records, stdout and stderr, in the order a stage field was logged */
  stages(): unknown[] {
    return [...this.logs, ...this.errors].map((record) => record.stage);
  }
}
