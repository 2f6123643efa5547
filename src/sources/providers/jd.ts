import { createHash } from 'node:crypto';
import {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from '../define.js';

const USER_METHOD = 'jingdong.user.getUserInfoByOpenId';
const RESPONSE_ROOT = 'jingdong_user_getUserInfoByOpenId_response';

/**
 * Router API signature: the secret, then every parameter but `sign` as
 * `keyvalue` sorted by key, then the secret again, MD5 in upper-case hex.
 */
export function signJdParams(params: Record<string, string>, secret: string): string {
  const content = Object.keys(params)
    .filter((key) => key !== 'sign')
    .sort()
    .map((key) => `${key}${params[key]}`)
    .join('');
  return createHash('md5')
    .update(`${secret}${content}${secret}`, 'utf8')
    .digest('hex')
    .toUpperCase();
}

export const jd = defineSource({
  name: 'jd',
  endpoints: {
    authorize: 'https://open-oauth.jd.com/oauth2/to_login',
    token: 'https://open-oauth.jd.com/oauth2/access_token',
    profile: 'https://api.jd.com/routerjson',
    refresh: 'https://open-oauth.jd.com/oauth2/refresh_token',
  },
  defaultScopes: ['snsapi_base'],
  scopeDelimiter: ',',
  authorize: { params: { clientId: 'app_key' } },
  token: {
    params: { clientId: 'app_key', clientSecret: 'app_secret', redirectUri: null },
    fields: { openId: 'uid' },
  },
  profile: { root: `${RESPONSE_ROOT}.result.data` },
  identity: {
    uuid: '@token.openId',
    username: 'userInfo.nickName',
    nickname: 'userInfo.nickName',
    avatar: 'userInfo.imageUrl',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('error_response.code', 'error_response.zh_desc'),
    codeErrorCheck(`${RESPONSE_ROOT}.error_response.code`, `${RESPONSE_ROOT}.error_response.zh_desc`)
  ),
  overrides: {
    profileRequest: (ctx, token) => {
      const data: Record<string, string> = {
        method: USER_METHOD,
        access_token: token.accessToken,
        app_key: ctx.config.clientId,
        timestamp: String(ctx.now),
        '360buy_param_json': JSON.stringify({ openId: token.openId ?? '' }),
      };
      data.sign = signJdParams(data, ctx.config.clientSecret);
      return {
        method: 'POST',
        url: ctx.endpoints.profile ?? '',
        body: { encoding: 'form', data },
      };
    },
  },
});
