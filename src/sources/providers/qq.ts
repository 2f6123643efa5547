import {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from '../define.js';
import { asString } from '../../utils/guards.js';

/**
 * QQ Connect. The token response carries no user id, so an extra call to
 * `/oauth2.0/me` resolves the openid before the profile fetch.
 */
export const qq = defineSource({
  name: 'qq',
  endpoints: {
    authorize: 'https://graph.qq.com/oauth2.0/authorize',
    token: 'https://graph.qq.com/oauth2.0/token',
    profile: 'https://graph.qq.com/user/get_user_info',
    refresh: 'https://graph.qq.com/oauth2.0/token',
  },
  defaultScopes: ['get_user_info'],
  scopeDelimiter: ',',
  token: { method: 'GET', extra: { fmt: 'json' } },
  profile: {
    auth: { query: 'access_token' },
    query: (ctx, token) => ({
      oauth_consumer_key: ctx.config.clientId,
      openid: token.openId ?? '',
    }),
  },
  identity: {
    uuid: '@token.openId',
    username: 'nickname',
    nickname: 'nickname',
    avatar: 'figureurl_qq_2',
    location: 'city',
    gender: 'gender',
  },
  errorCheck: combineErrorChecks(oauthErrorCheck, codeErrorCheck('ret', 'msg')),
  overrides: {
    augmentToken: {
      request: (_ctx, token) => ({
        method: 'GET',
        url: 'https://graph.qq.com/oauth2.0/me',
        query: { access_token: token.accessToken, fmt: 'json', unionid: '1' },
      }),
      apply: (raw, token) => {
        const augmented = { ...token };
        const openId = asString(raw.openid);
        const unionId = asString(raw.unionid);
        if (openId !== undefined) augmented.openId = openId;
        if (unionId !== undefined) augmented.unionId = unionId;
        return augmented;
      },
    },
  },
});
