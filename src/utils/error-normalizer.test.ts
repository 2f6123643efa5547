import { expect } from 'chai';
import { AuthError } from '../errors.js';
import { ErrorNormalizer, createStandardError } from './error-normalizer.js';
import { OperationTimeoutError } from './timeout.js';
import { errorData } from '../fixtures/test-data.js';

describe('ErrorNormalizer', () => {
  it('should pass OAuth-shaped errors through with the requested kind', () => {
    const normalized = ErrorNormalizer.normalizeError(
      errorData.oauthError,
      'TokenExchangeFailed',
      { endpoint: 'https://provider.example.com/token', source: 'github' }
    );

    expect(normalized).to.be.instanceOf(AuthError);
    expect(normalized.toJSON()).to.deep.equal({
      kind: 'TokenExchangeFailed',
      statusCode: 400,
      error: 'invalid_grant',
      error_description: 'Invalid authorization code',
      endpoint: 'https://provider.example.com/token',
      source: 'github',
    });
  });

  it('should normalize fetch-like response objects', () => {
    const normalized = ErrorNormalizer.normalizeError(
      { status: 404, statusText: 'Not Found' },
      'ProfileFetchFailed'
    );

    expect(normalized.kind).to.equal('ProfileFetchFailed');
    expect(normalized.statusCode).to.equal(404);
    expect(normalized.error).to.equal('invalid_request');
    expect(normalized.error_description).to.equal('Not Found');
  });

  it('should use the reason phrase when a response has no status text', () => {
    const normalized = ErrorNormalizer.normalizeError(
      { status: 503, statusText: '' },
      'TokenExchangeFailed'
    );
    expect(normalized.error).to.equal('server_error');
    expect(normalized.error_description).to.equal('Service Unavailable');
  });

  it('should fall back to message when error_description is missing', () => {
    const normalized = ErrorNormalizer.normalizeError(
      { statusCode: 400, error: 'invalid_request', message: 'Bad input' },
      'TokenExchangeFailed'
    );
    expect(normalized.error_description).to.equal('Bad input');
  });

  it('should map timeout errors to kind Timeout whatever kind was asked for', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new OperationTimeoutError('login', 50),
      'TokenExchangeFailed'
    );

    expect(normalized.kind).to.equal('Timeout');
    expect(normalized.statusCode).to.equal(504);
    expect(normalized.error).to.equal('temporarily_unavailable');
    expect(normalized.error_description).to.equal('login timed out after 50ms');
  });

  it('should map abort errors to kind Timeout', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    const normalized = ErrorNormalizer.normalizeError(abort, 'CacheFailure');
    expect(normalized.kind).to.equal('Timeout');
  });

  it('should map timeout-looking native messages to kind Timeout', () => {
    const normalized = ErrorNormalizer.normalizeError(
      errorData.networkTimeout,
      'ProfileFetchFailed'
    );
    expect(normalized.kind).to.equal('Timeout');
    expect(normalized.statusCode).to.equal(504);
  });

  it('should map network errors to 503 server_error', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new Error('connect ECONNREFUSED 127.0.0.1:6379'),
      'CacheFailure'
    );
    expect(normalized.kind).to.equal('CacheFailure');
    expect(normalized.statusCode).to.equal(503);
    expect(normalized.error).to.equal('server_error');
    expect(normalized.error_description).to.equal(
      'connect ECONNREFUSED 127.0.0.1:6379'
    );
  });

  it('should map unauthorized and forbidden messages', () => {
    expect(
      ErrorNormalizer.normalizeError(new Error('401 Unauthorized'), 'TokenExchangeFailed')
        .error
    ).to.equal('unauthorized');
    expect(
      ErrorNormalizer.normalizeError(new Error('Forbidden'), 'TokenExchangeFailed')
        .statusCode
    ).to.equal(403);
  });

  it('should wrap string errors as server_error', () => {
    const normalized = ErrorNormalizer.normalizeError('boom', 'CacheFailure');
    expect(normalized.statusCode).to.equal(500);
    expect(normalized.error).to.equal('server_error');
    expect(normalized.error_description).to.equal('boom');
  });

  it('should fall back to a generic server_error', () => {
    const normalized = ErrorNormalizer.normalizeError(42, 'CacheFailure');
    expect(normalized.statusCode).to.equal(500);
    expect(normalized.error_description).to.equal('Internal Server Error');
  });

  it('should return AuthErrors unchanged', () => {
    const original = createStandardError('StateMismatch', 'invalid_state', 'gone');
    expect(ErrorNormalizer.normalizeError(original, 'CacheFailure')).to.equal(
      original
    );
  });

  it('should map status codes to OAuth error codes', () => {
    expect(ErrorNormalizer.mapStatusToOAuthError(400)).to.equal('invalid_request');
    expect(ErrorNormalizer.mapStatusToOAuthError(401)).to.equal('unauthorized');
    expect(ErrorNormalizer.mapStatusToOAuthError(403)).to.equal('access_denied');
    expect(ErrorNormalizer.mapStatusToOAuthError(422)).to.equal('invalid_request');
    expect(ErrorNormalizer.mapStatusToOAuthError(429)).to.equal(
      'temporarily_unavailable'
    );
    expect(ErrorNormalizer.mapStatusToOAuthError(502)).to.equal('server_error');
  });
});

describe('createStandardError', () => {
  it('should build an AuthError with a 400 default status', () => {
    const error = createStandardError(
      'StateMismatch',
      'invalid_state',
      'State is unknown or expired',
      { source: 'github' }
    );

    expect(error.message).to.equal('State is unknown or expired');
    expect(error.toJSON()).to.deep.equal({
      kind: 'StateMismatch',
      statusCode: 400,
      error: 'invalid_state',
      error_description: 'State is unknown or expired',
      source: 'github',
    });
  });

  it('should coerce non-error status codes to 500', () => {
    const error = createStandardError(
      'ProfileFetchFailed',
      'invalid_response',
      'odd',
      {},
      302
    );
    expect(error.statusCode).to.equal(500);
  });
});
