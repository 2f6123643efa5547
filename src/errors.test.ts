import { expect } from 'chai';
import { AuthError, isAuthError } from './errors.js';

describe('AuthError', () => {
  const error = new AuthError(
    {
      kind: 'StateMismatch',
      statusCode: 400,
      error: 'invalid_request',
      error_description: 'Unknown, expired or already used state',
      source: 'github',
    },
    { cause: 'replay' }
  );

  it('should use the description as its message', () => {
    expect(error.message).to.equal('Unknown, expired or already used state');
    expect(error.name).to.equal('AuthError');
    expect(error.cause).to.equal('replay');
  });

  it('should fall back to the error code when there is no description', () => {
    const bare = new AuthError({
      kind: 'Timeout',
      statusCode: 504,
      error: 'temporarily_unavailable',
    });
    expect(bare.message).to.equal('temporarily_unavailable');
    expect(bare.toJSON()).to.deep.equal({
      kind: 'Timeout',
      statusCode: 504,
      error: 'temporarily_unavailable',
    });
  });

  it('should omit unset optional fields from JSON', () => {
    expect(error.toJSON()).to.deep.equal({
      kind: 'StateMismatch',
      statusCode: 400,
      error: 'invalid_request',
      error_description: 'Unknown, expired or already used state',
      source: 'github',
    });
  });

  describe('isAuthError', () => {
    it('should narrow by class and optionally by kind', () => {
      expect(isAuthError(error)).to.be.true;
      expect(isAuthError(error, 'StateMismatch')).to.be.true;
      expect(isAuthError(error, 'Timeout')).to.be.false;
    });

    it('should reject look-alike objects', () => {
      expect(isAuthError({ kind: 'StateMismatch', statusCode: 400 })).to.be.false;
      expect(isAuthError(new Error('boom'))).to.be.false;
    });
  });
});
