import { createHmac } from 'node:crypto';
import { codeErrorCheck, defineSource } from '../define.js';
import { asString, isRecord } from '../../utils/guards.js';

/**
 * HMAC-SHA256 of the millisecond timestamp keyed with the app secret,
 * base64 encoded.
 */
export function signDingtalkTimestamp(timestamp: string, secret: string): string {
  return createHmac('sha256', secret).update(timestamp, 'utf8').digest('base64');
}

/**
 * DingTalk QR-code login. The app credential comes from `gettoken`; the
 * user behind the temporary code is resolved by a signed
 * `sns/getuserinfo_bycode` call, so no profile endpoint is involved.
 */
export const dingtalk = defineSource({
  name: 'dingtalk',
  endpoints: {
    authorize: 'https://oapi.dingtalk.com/connect/qrconnect',
    token: 'https://oapi.dingtalk.com/gettoken',
  },
  defaultScopes: ['openid', 'corpid'],
  quirks: { identityInTokenResponse: true },
  authorize: { params: { clientId: 'appid' } },
  token: {
    method: 'GET',
    params: {
      clientId: 'appkey',
      clientSecret: 'appsecret',
      code: null,
      redirectUri: null,
      grantType: null,
    },
  },
  identity: {
    uuid: '@token.unionId',
    username: '@token.extras.nick',
    nickname: '@token.extras.nick',
  },
  errorCheck: codeErrorCheck('errcode', 'errmsg'),
  overrides: {
    augmentToken: {
      request: (ctx, _token, input) => {
        const timestamp = String(ctx.now);
        return {
          method: 'POST',
          url: 'https://oapi.dingtalk.com/sns/getuserinfo_bycode',
          query: {
            accessKey: ctx.config.clientId,
            timestamp,
            signature: signDingtalkTimestamp(timestamp, ctx.config.clientSecret),
          },
          body: { encoding: 'json', data: { tmp_auth_code: input.code } },
        };
      },
      apply: (raw, token) => {
        const user = isRecord(raw.user_info) ? raw.user_info : {};
        const augmented = { ...token, extras: { ...token.extras, ...user } };
        const openId = asString(user.openid);
        const unionId = asString(user.unionid);
        if (openId !== undefined) augmented.openId = openId;
        if (unionId !== undefined) augmented.unionId = unionId;
        return augmented;
      },
    },
  },
});
