import { expect } from 'chai';
import {
  AuthPhase,
  canTransition,
  isTerminalPhase,
  oauth1TokenKey,
  parseAuthState,
  serializeAuthState,
  stateKey,
} from './auth-state.js';

describe('auth state', () => {
  it('should namespace cache keys', () => {
    expect(stateKey('s1')).to.equal('oauth:state:s1');
    expect(oauth1TokenKey('t1')).to.equal('oauth:oauth1a:t1');
  });

  it('should parse what it serializes', () => {
    const state = {
      state: 's1',
      source: 'twitter',
      createdAt: 1_700_000_000_000,
      oauthToken: 't1',
      oauthTokenSecret: 'test-token-secret',
    };
    expect(parseAuthState(serializeAuthState(state))).to.deep.equal(state);
  });

  it('should read malformed entries as absent', () => {
    expect(parseAuthState(undefined)).to.be.undefined;
    expect(parseAuthState('not json')).to.be.undefined;
    expect(parseAuthState('{"state":"s1"}')).to.be.undefined;
    expect(
      parseAuthState('{"state":"s1","source":"github","createdAt":-1}')
    ).to.be.undefined;
  });

  describe('phase transitions', () => {
    it('should follow the happy path one step at a time', () => {
      expect(canTransition(AuthPhase.Created, AuthPhase.Authorizing)).to.be.true;
      expect(canTransition(AuthPhase.Authorizing, AuthPhase.Validated)).to.be.true;
      expect(canTransition(AuthPhase.Validated, AuthPhase.Exchanged)).to.be.true;
      expect(canTransition(AuthPhase.Exchanged, AuthPhase.ProfileFetched)).to.be
        .true;
    });

    it('should fail from any non-terminal phase', () => {
      for (const phase of [
        AuthPhase.Created,
        AuthPhase.Authorizing,
        AuthPhase.Validated,
        AuthPhase.Exchanged,
      ]) {
        expect(canTransition(phase, AuthPhase.Failed), phase).to.be.true;
      }
    });

    it('should reject skipped and backward steps', () => {
      expect(canTransition(AuthPhase.Authorizing, AuthPhase.Exchanged)).to.be.false;
      expect(canTransition(AuthPhase.Exchanged, AuthPhase.Validated)).to.be.false;
      expect(canTransition(AuthPhase.ProfileFetched, AuthPhase.Failed)).to.be.false;
    });

    it('should treat ProfileFetched and Failed as terminal', () => {
      expect(isTerminalPhase(AuthPhase.ProfileFetched)).to.be.true;
      expect(isTerminalPhase(AuthPhase.Failed)).to.be.true;
      expect(isTerminalPhase(AuthPhase.Validated)).to.be.false;
    });
  });
});
