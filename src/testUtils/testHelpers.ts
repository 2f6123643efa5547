/**
 * Common test utilities and helpers
 * Reduces duplication across test files
 */

import { expect } from 'chai';
import type { AuthErrorKind } from '../types.js';
import { AuthError } from '../errors.js';
import { DefaultLogger } from '../logging/logger.js';
import { LogLevel, type Logger } from '../logging/types.js';
import { MockTransport } from './logTransports.js';

/**
 * Await `fn` and assert it rejects with an AuthError of `kind`.
 * Returns the error for further assertions.
 */
export async function expectAuthError(
  fn: () => Promise<unknown>,
  kind: AuthErrorKind,
  expectedError?: string
): Promise<AuthError> {
  let caught: unknown;
  try {
    await fn();
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof AuthError)) {
    return expect.fail(`expected an AuthError, got ${String(caught)}`);
  }
  expect(caught.kind).to.equal(kind);
  if (expectedError !== undefined) {
    expect(caught.error).to.equal(expectedError);
  }
  return caught;
}

/**
 * Synchronous counterpart of {@link expectAuthError}.
 */
export function expectAuthErrorSync(
  fn: () => unknown,
  kind: AuthErrorKind
): AuthError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof AuthError)) {
    return expect.fail(`expected an AuthError, got ${String(caught)}`);
  }
  expect(caught.kind).to.equal(kind);
  return caught;
}

/**
 * A logger that records everything at Debug level.
 */
export function recordingLogger(): { logger: Logger; transport: MockTransport } {
  const transport = new MockTransport();
  const logger = new DefaultLogger({}, { level: LogLevel.Debug }, transport);
  return { logger, transport };
}

export function silentLogger(): Logger {
  return new DefaultLogger({}, { level: LogLevel.Silent });
}
