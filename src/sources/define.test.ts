import { expect } from 'chai';
import {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from './define.js';
import type { SourceContext } from './types.js';

function contextFor(
  endpoints: SourceContext['endpoints'],
  scope = 'read'
): SourceContext {
  return {
    config: {
      clientId: 'abc',
      clientSecret: 'test-secret',
      redirectUri: 'http://x/cb',
    },
    endpoints,
    scope,
    now: 0,
  };
}

describe('defineSource', () => {
  const example = defineSource({
    name: 'example',
    endpoints: {
      authorize: 'https://id.example.com/authorize',
      token: 'https://id.example.com/token',
      profile: 'https://api.example.com/me',
      refresh: 'https://id.example.com/token',
      revoke: 'https://id.example.com/revoke',
    },
    defaultScopes: ['read'],
    identity: { uuid: 'id', nickname: 'name' },
  });
  const ctx = contextFor(example.endpoints);

  it('should produce a frozen descriptor with defaults', () => {
    expect(Object.isFrozen(example)).to.be.true;
    expect(Object.isFrozen(example.endpoints)).to.be.true;
    expect(example.grant).to.equal('authorization_code');
    expect(example.scopeDelimiter).to.equal(' ');
    expect(example.tokenFields.accessToken).to.equal('access_token');
    expect(example.detectError).to.equal(oauthErrorCheck);
  });

  it('should build the standard authorize template', () => {
    expect(example.authorizeUrl(ctx, { state: 's1' })).to.deep.equal({
      endpoint: 'https://id.example.com/authorize',
      params: {
        client_id: 'abc',
        redirect_uri: 'http://x/cb',
        response_type: 'code',
        scope: 'read',
        state: 's1',
      },
    });
  });

  it('should leave an empty scope out of the authorize template', () => {
    const template = example.authorizeUrl(
      contextFor(example.endpoints, ''),
      { state: 's1' }
    );
    expect(template.params).to.not.have.property('scope');
  });

  it('should post a form-encoded token exchange', () => {
    const request = example.tokenRequest(ctx, {
      callback: { code: 'c1', params: {} },
      code: 'c1',
    });
    expect(request).to.deep.equal({
      method: 'POST',
      url: 'https://id.example.com/token',
      responseFormat: 'json',
      body: {
        encoding: 'form',
        data: {
          grant_type: 'authorization_code',
          code: 'c1',
          client_id: 'abc',
          client_secret: 'test-secret',
          redirect_uri: 'http://x/cb',
        },
      },
    });
  });

  it('should send the access token as a bearer header to the profile endpoint', () => {
    const request = example.profileRequest?.(ctx, { accessToken: 'at' });
    expect(request).to.deep.equal({
      method: 'GET',
      url: 'https://api.example.com/me',
      responseFormat: 'json',
      query: {},
      headers: { Authorization: 'Bearer at' },
    });
  });

  it('should build refresh and revoke requests when the endpoints exist', () => {
    expect(example.refreshRequest?.(ctx, 'rt')?.body?.data).to.deep.equal({
      grant_type: 'refresh_token',
      refresh_token: 'rt',
      client_id: 'abc',
      client_secret: 'test-secret',
    });
    expect(example.revokeRequest?.(ctx, { accessToken: 'at' })).to.deep.equal({
      method: 'POST',
      url: 'https://id.example.com/revoke',
      body: {
        encoding: 'form',
        data: { token: 'at', client_id: 'abc', client_secret: 'test-secret' },
      },
    });
  });

  it('should omit optional functions when the endpoints are absent', () => {
    const bare = defineSource({
      name: 'bare',
      endpoints: { authorize: 'https://a.example.com', token: 'https://t.example.com' },
      identity: { uuid: 'id' },
    });
    expect(bare.profileRequest).to.be.undefined;
    expect(bare.refreshRequest).to.be.undefined;
    expect(bare.revokeRequest).to.be.undefined;
    expect(bare.requestTokenRequest).to.be.undefined;
  });

  it('should rename and drop parameters and send GET token calls as a query', () => {
    const custom = defineSource({
      name: 'custom',
      endpoints: {
        authorize: 'https://a.example.com/auth',
        token: 'https://a.example.com/token',
        profile: 'https://a.example.com/user',
      },
      authorize: {
        params: { clientId: 'appid', responseType: null },
        extra: { display: 'page' },
        fragment: 'frag',
      },
      token: {
        method: 'GET',
        params: { clientId: 'appid', clientSecret: 'secret', redirectUri: null },
        fields: { openId: 'openid' },
      },
      profile: { auth: { query: 'access_token' }, query: (_ctx, token) => ({ openid: token.openId ?? '' }) },
      identity: { uuid: '@token.openId' },
    });
    const customCtx = contextFor(custom.endpoints);

    expect(custom.authorizeUrl(customCtx, { state: 's' })).to.deep.equal({
      endpoint: 'https://a.example.com/auth',
      params: {
        appid: 'abc',
        redirect_uri: 'http://x/cb',
        scope: 'read',
        state: 's',
        display: 'page',
      },
      fragment: 'frag',
    });

    const tokenRequest = custom.tokenRequest(customCtx, {
      callback: { params: {} },
      code: 'c1',
    });
    expect(tokenRequest.method).to.equal('GET');
    expect(tokenRequest.body).to.be.undefined;
    expect(tokenRequest.query).to.deep.equal({
      grant_type: 'authorization_code',
      code: 'c1',
      appid: 'abc',
      secret: 'test-secret',
    });

    const profile = custom.profileRequest?.(customCtx, {
      accessToken: 'at',
      openId: 'o1',
    });
    expect(profile?.query).to.deep.equal({ openid: 'o1', access_token: 'at' });
    expect(profile?.headers).to.deep.equal({});
  });

  it('should describe OAuth 1.0a flows with signing inputs', () => {
    const oauth1 = defineSource({
      name: 'oauth1-example',
      grant: 'oauth1a',
      endpoints: {
        requestToken: 'https://o.example.com/request_token',
        authorize: 'https://o.example.com/authorize',
        token: 'https://o.example.com/access_token',
        profile: 'https://o.example.com/me',
      },
      identity: { uuid: 'id' },
    });
    const oauth1Ctx = contextFor(oauth1.endpoints);

    expect(oauth1.requestTokenRequest?.(oauth1Ctx, 'oob')).to.deep.equal({
      method: 'POST',
      url: 'https://o.example.com/request_token',
      responseFormat: 'form',
      oauth1: { params: { oauth_callback: 'oob' } },
    });
    expect(
      oauth1.authorizeUrl(oauth1Ctx, { state: 's', oauthToken: 'rt' }).params
    ).to.deep.equal({ oauth_token: 'rt' });
    expect(
      oauth1.tokenRequest(oauth1Ctx, {
        callback: { params: {} },
        code: 'v1',
        oauthToken: 'rt',
        oauthTokenSecret: 'rs',
      }).oauth1
    ).to.deep.equal({
      params: { oauth_verifier: 'v1' },
      token: 'rt',
      tokenSecret: 'rs',
    });
    expect(
      oauth1.profileRequest?.(oauth1Ctx, { accessToken: 'at', tokenSecret: 'ts' })
        ?.oauth1
    ).to.deep.equal({ token: 'at', tokenSecret: 'ts' });
    expect(
      oauth1.parseTokenResponse({
        oauth_token: 'at',
        oauth_token_secret: 'ts',
        user_id: '9',
      })
    ).to.deep.equal({ accessToken: 'at', tokenSecret: 'ts', uid: '9' });
  });

  it('should let overrides replace generated functions', () => {
    const overridden = defineSource({
      name: 'overridden',
      endpoints: { authorize: 'https://a.example.com', token: 'https://t.example.com' },
      identity: { uuid: 'id' },
      overrides: {
        parseTokenResponse: () => ({ accessToken: 'fixed' }),
      },
    });
    expect(overridden.parseTokenResponse({})).to.deep.equal({
      accessToken: 'fixed',
    });
  });
});

describe('error checks', () => {
  it('should read standard and Graph-style OAuth errors', () => {
    expect(oauthErrorCheck({ access_token: 'x' })).to.be.undefined;
    expect(
      oauthErrorCheck({ error: 'invalid_grant', error_description: 'expired' })
    ).to.deep.equal({ error: 'invalid_grant', description: 'expired' });
    expect(
      oauthErrorCheck({ error: { message: 'Bad code', type: 'OAuthException' } })
    ).to.deep.equal({ error: 'OAuthException', description: 'Bad code' });
  });

  it('should read status-code style errors', () => {
    const check = codeErrorCheck('errcode', 'errmsg');
    expect(check({ errcode: 0, openid: 'o' })).to.be.undefined;
    expect(check({ openid: 'o' })).to.be.undefined;
    expect(check({ errcode: 40029, errmsg: 'invalid code' })).to.deep.equal({
      error: '40029',
      description: 'invalid code',
    });
  });

  it('should honour custom success codes and nested paths', () => {
    const check = codeErrorCheck('data.code', 'data.msg', ['10000']);
    expect(check({ data: { code: '10000' } })).to.be.undefined;
    expect(check({ data: { code: '40002', msg: 'bad' } })).to.deep.equal({
      error: '40002',
      description: 'bad',
    });
  });

  it('should return the first failure among combined checks', () => {
    const check = combineErrorChecks(
      codeErrorCheck('ret', 'msg'),
      oauthErrorCheck
    );
    expect(check({ ret: 0 })).to.be.undefined;
    expect(check({ ret: 0, error: 'e' })).to.deep.equal({
      error: 'e',
      description: undefined,
    });
    expect(check({ ret: -1, msg: 'no', error: 'e' })).to.deep.equal({
      error: '-1',
      description: 'no',
    });
  });
});
