import { createHash } from 'node:crypto';
import {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from '../define.js';

/** MD5 of app id, timestamp and secret, concatenated, in lower-case hex */
export function signMeituanRequest(
  appId: string,
  timestamp: string,
  secret: string
): string {
  return createHash('md5').update(`${appId}${timestamp}${secret}`, 'utf8').digest('hex');
}

/**
 * Meituan Waimai open platform. Profile calls carry a signed timestamp in
 * seconds alongside the access token.
 */
export const meituan = defineSource({
  name: 'meituan',
  endpoints: {
    authorize: 'https://openapi.waimai.meituan.com/oauth/authorize',
    token: 'https://openapi.waimai.meituan.com/oauth/access_token',
    profile: 'https://openapi.waimai.meituan.com/oauth/userinfo',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  profile: {
    auth: 'none',
    query: (ctx, token) => {
      const timestamp = String(Math.floor(ctx.now / 1000));
      return {
        app_id: ctx.config.clientId,
        access_token: token.accessToken,
        timestamp,
        sign: signMeituanRequest(ctx.config.clientId, timestamp, ctx.config.clientSecret),
      };
    },
    root: 'data',
  },
  identity: {
    uuid: 'openid',
    username: 'username',
    nickname: 'nickname',
    avatar: 'avatar',
  },
  errorCheck: combineErrorChecks(
    codeErrorCheck('status', 'error.message', ['success']),
    oauthErrorCheck
  ),
});
