import { codeErrorCheck, defineSource } from '../define.js';
import type { SourceDescriptor } from '../types.js';

const wechatErrors = codeErrorCheck('errcode', 'errmsg');

const wechatTokenFields = { openId: 'openid', unionId: 'unionid' };

function wechatWebSource(
  name: string,
  authorize: string,
  scope: string
): SourceDescriptor {
  return defineSource({
    name,
    endpoints: {
      authorize,
      token: 'https://api.weixin.qq.com/sns/oauth2/access_token',
      profile: 'https://api.weixin.qq.com/sns/userinfo',
      refresh: 'https://api.weixin.qq.com/sns/oauth2/refresh_token',
    },
    defaultScopes: [scope],
    scopeDelimiter: ',',
    authorize: { params: { clientId: 'appid' }, fragment: 'wechat_redirect' },
    token: {
      method: 'GET',
      params: { clientId: 'appid', clientSecret: 'secret', redirectUri: null },
      fields: wechatTokenFields,
    },
    profile: {
      auth: { query: 'access_token' },
      query: (_ctx, token) => ({ openid: token.openId ?? '', lang: 'zh_CN' }),
    },
    identity: {
      uuid: 'openid',
      username: 'nickname',
      nickname: 'nickname',
      avatar: 'headimgurl',
      location: 'city',
      gender: 'sex',
    },
    errorCheck: wechatErrors,
  });
}

/** WeChat official account (in-app browser) login */
export const wechat = wechatWebSource(
  'wechat',
  'https://open.weixin.qq.com/connect/oauth2/authorize',
  'snsapi_userinfo'
);

/** WeChat open platform QR-code login for websites */
export const wechatOpen = wechatWebSource(
  'wechat_open',
  'https://open.weixin.qq.com/connect/qrconnect',
  'snsapi_login'
);

/**
 * Mini-program login. The client obtains a code through `wx.login()`, so
 * there is no redirect, no state and no profile endpoint: the session
 * response is the identity.
 */
export const wechatMini = defineSource({
  name: 'wechat_mini',
  endpoints: {
    authorize: '',
    token: 'https://api.weixin.qq.com/sns/jscode2session',
  },
  quirks: { stateless: true, identityInTokenResponse: true },
  token: {
    method: 'GET',
    params: {
      clientId: 'appid',
      clientSecret: 'secret',
      code: 'js_code',
      redirectUri: null,
    },
    fields: { accessToken: 'session_key', ...wechatTokenFields },
  },
  identity: { uuid: 'openid' },
  errorCheck: wechatErrors,
});
