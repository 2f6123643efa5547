import { expect } from 'chai';
import { ZodError } from 'zod';
import { AuthConfigSchema, formatIssues, safeValidate, validate } from './schema.js';
import { testConfigs } from '../fixtures/test-data.js';

describe('config schema', () => {
  it('should validate and freeze a config', () => {
    const config = validate({
      ...testConfigs.minimal,
      scopes: ['read'],
      extras: { key: 'test-key' },
      endpoints: { token: 'https://gitlab.example.com/oauth/token' },
    });

    expect(config.clientId).to.equal('abc');
    expect(Object.isFrozen(config)).to.be.true;
    expect(Object.isFrozen(config.scopes)).to.be.true;
    expect(Object.isFrozen(config.endpoints)).to.be.true;
  });

  it('should accept a config without redirect URI', () => {
    expect(validate(testConfigs.wechatMini)).to.deep.equal(testConfigs.wechatMini);
  });

  it('should throw a ZodError for invalid configs', () => {
    expect(() => validate({ clientId: '', clientSecret: 'test-secret' })).to.throw(
      ZodError
    );
  });

  it('should report issues through safeValidate', () => {
    const result = safeValidate({
      clientId: 'abc',
      clientSecret: '',
      redirectUri: 'not a url',
    });

    expect(result.success).to.be.false;
    expect(result.data).to.be.undefined;
    const error = result.error;
    if (!error) return expect.fail('expected a ZodError');
    expect(formatIssues(error)).to.equal(
      'clientSecret: clientSecret is required; redirectUri: Invalid redirect URI'
    );
  });

  it('should reject unknown endpoint overrides and invalid URLs', () => {
    const result = AuthConfigSchema.safeParse({
      ...testConfigs.minimal,
      endpoints: { token: 'nope' },
    });
    expect(result.success).to.be.false;
    if (result.success) return;
    expect(formatIssues(result.error)).to.equal(
      'endpoints.token: Invalid token endpoint URL'
    );

    const unknown = AuthConfigSchema.safeParse({
      ...testConfigs.minimal,
      endpoints: { userinfo: 'https://example.com' },
    });
    expect(unknown.success).to.be.false;
  });

  it('should reject empty scope entries', () => {
    expect(
      safeValidate({ ...testConfigs.minimal, scopes: ['read', ''] }).success
    ).to.be.false;
  });
});
