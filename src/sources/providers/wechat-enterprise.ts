import { codeErrorCheck, defineSource } from '../define.js';
import { asString } from '../../utils/guards.js';

/**
 * WeCom (WeChat Work) QR login. The corp token comes from `gettoken`, the
 * code resolves to a member id through `getuserinfo`, and `user/get` returns
 * the member.
 */
export const wechatEnterprise = defineSource({
  name: 'wechat_enterprise',
  endpoints: {
    authorize: 'https://open.work.weixin.qq.com/wwopen/sso/qrConnect',
    token: 'https://qyapi.weixin.qq.com/cgi-bin/gettoken',
    profile: 'https://qyapi.weixin.qq.com/cgi-bin/user/get',
  },
  defaultScopes: ['snsapi_base'],
  scopeDelimiter: ',',
  authorize: { params: { clientId: 'appid' } },
  token: {
    method: 'GET',
    params: {
      clientId: 'corpid',
      clientSecret: 'corpsecret',
      code: null,
      redirectUri: null,
      grantType: null,
    },
  },
  profile: {
    auth: { query: 'access_token' },
    query: (_ctx, token) => ({ userid: token.uid ?? '' }),
  },
  identity: {
    uuid: 'userid',
    username: 'userid',
    nickname: 'name',
    avatar: 'avatar',
    email: 'email',
    mobile: 'mobile',
    gender: 'gender',
  },
  errorCheck: codeErrorCheck('errcode', 'errmsg'),
  overrides: {
    augmentToken: {
      request: (_ctx, token, input) => ({
        method: 'GET',
        url: 'https://qyapi.weixin.qq.com/cgi-bin/user/getuserinfo',
        query: { access_token: token.accessToken, code: input.code },
      }),
      apply: (raw, token) => {
        const augmented = { ...token };
        const userId = asString(raw.UserId);
        const openId = asString(raw.OpenId);
        if (userId !== undefined) augmented.uid = userId;
        if (openId !== undefined) augmented.openId = openId;
        return augmented;
      },
    },
  },
});
