import { expect } from 'chai';
import { createVerify, generateKeyPairSync } from 'node:crypto';
import { alipay, alipaySigningContent, alipayTimestamp } from './alipay.js';
import type { SourceContext } from '../types.js';

describe('alipay', () => {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
  const now = Date.UTC(2024, 0, 1, 16, 30, 5);
  const ctx: SourceContext = {
    config: {
      clientId: 'test-app-id',
      clientSecret: privateKey,
      redirectUri: 'https://app.example.com/callback/alipay',
    },
    endpoints: alipay.endpoints,
    scope: 'auth_user',
    now,
  };

  it('should format gateway timestamps in Beijing time', () => {
    expect(alipayTimestamp(now)).to.equal('2024-01-02 00:30:05');
  });

  it('should sign sorted, non-empty parameters without the sign itself', () => {
    expect(
      alipaySigningContent({ b: '2', sign: 'old', a: '1', empty: '' })
    ).to.equal('a=1&b=2');
  });

  it('should use app_id and no response_type on the authorize URL', () => {
    expect(alipay.authorizeUrl(ctx, { state: 's1' }).params).to.deep.equal({
      app_id: 'test-app-id',
      redirect_uri: 'https://app.example.com/callback/alipay',
      scope: 'auth_user',
      state: 's1',
    });
  });

  it('should send a signed gateway call for the token exchange', () => {
    const request = alipay.tokenRequest(ctx, {
      callback: { code: 'auth-code-1', params: {} },
      code: 'auth-code-1',
    });

    expect(request.method).to.equal('POST');
    expect(request.url).to.equal('https://openapi.alipay.com/gateway.do');
    const data = request.body?.data ?? {};
    expect(data).to.include({
      app_id: 'test-app-id',
      charset: 'utf-8',
      sign_type: 'RSA2',
      timestamp: '2024-01-02 00:30:05',
      version: '1.0',
      method: 'alipay.system.oauth.token',
      grant_type: 'authorization_code',
      code: 'auth-code-1',
    });

    const params: Record<string, string> = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string') params[key] = value;
    }
    const verifier = createVerify('RSA-SHA256');
    verifier.update(alipaySigningContent(params), 'utf8');
    expect(verifier.verify(publicKey, params.sign ?? '', 'base64')).to.be.true;
  });

  it('should sign profile calls with the auth token', () => {
    const request = alipay.profileRequest?.(ctx, { accessToken: 'at' });
    expect(request?.body?.data).to.include({
      method: 'alipay.user.info.share',
      auth_token: 'at',
    });
    expect(request?.headers).to.be.undefined;
  });

  it('should read tokens and profiles from their response envelopes', () => {
    const token = alipay.parseTokenResponse({
      alipay_system_oauth_token_response: {
        access_token: 'at',
        refresh_token: 'rt',
        expires_in: 1296000,
        user_id: '2088000000000001',
      },
      sign: 'response-signature',
    });
    expect(token).to.deep.equal({
      accessToken: 'at',
      refreshToken: 'rt',
      expiresIn: 1296000,
      uid: '2088000000000001',
    });

    const identity = alipay.parseProfileResponse(
      {
        alipay_user_info_share_response: {
          code: '10000',
          msg: 'Success',
          user_id: '2088000000000001',
          nick_name: 'Ali',
          gender: 'F',
          city: 'Hangzhou',
        },
      },
      token
    );
    expect(identity).to.deep.equal({
      uuid: '2088000000000001',
      username: 'Ali',
      nickname: 'Ali',
      location: 'Hangzhou',
      gender: 'female',
    });
  });

  it('should detect gateway and envelope errors', () => {
    expect(
      alipay.detectError({
        error_response: { code: '40002', msg: 'Invalid Arguments', sub_msg: 'invalid auth code' },
      })
    ).to.deep.equal({ error: '40002', description: 'invalid auth code' });
    expect(
      alipay.detectError({
        alipay_user_info_share_response: { code: '20001', sub_msg: 'token expired' },
      })
    ).to.deep.equal({ error: '20001', description: 'token expired' });
    expect(
      alipay.detectError({ alipay_user_info_share_response: { code: '10000' } })
    ).to.be.undefined;
  });
});
