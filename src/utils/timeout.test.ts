import { expect } from 'chai';
import sinon from 'sinon';
import { OperationTimeoutError, withTimeout } from './timeout.js';

describe('withTimeout', () => {
  let clock: sinon.SinonFakeTimers;

  beforeEach(() => {
    clock = sinon.useFakeTimers();
  });

  afterEach(() => {
    clock.restore();
  });

  it('should resolve with the operation result before the deadline', async () => {
    const result = await withTimeout(async () => 'done', 1000, 'login');
    expect(result).to.equal('done');
    expect(clock.countTimers()).to.equal(0);
  });

  it('should reject at the deadline and abort the signal', async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => undefined);
      },
      250,
      'token exchange'
    );
    const outcome = pending.then(
      () => undefined,
      (error: unknown) => error
    );

    await clock.tickAsync(250);
    const error = await outcome;

    expect(error).to.be.instanceOf(OperationTimeoutError);
    expect(error).to.have.property('name', 'TimeoutError');
    expect(error).to.have.property('message', 'token exchange timed out after 250ms');
    expect(seen?.aborted).to.be.true;
    expect(seen?.reason).to.equal(error);
  });

  it('should run without a deadline for non-positive timeouts', async () => {
    const result = await withTimeout(async (signal) => signal.aborted, 0, 'x');
    expect(result).to.be.false;
    expect(clock.countTimers()).to.equal(0);
  });

  it('should propagate operation failures unchanged', async () => {
    const failure = new Error('provider down');
    let caught: unknown;
    try {
      await withTimeout(async () => Promise.reject(failure), 1000, 'x');
    } catch (error) {
      caught = error;
    }
    expect(caught).to.equal(failure);
    expect(clock.countTimers()).to.equal(0);
  });
});
