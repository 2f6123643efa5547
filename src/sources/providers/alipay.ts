import { createSign } from 'node:crypto';
import { codeErrorCheck, combineErrorChecks, defineSource } from '../define.js';
import type { HttpRequestDescriptor } from '../../http/types.js';
import type { SourceContext } from '../types.js';

const TOKEN_ROOT = 'alipay_system_oauth_token_response';
const PROFILE_ROOT = 'alipay_user_info_share_response';
const BEIJING_OFFSET_MS = 8 * 60 * 60 * 1000;

/**
 * Gateway timestamps are Beijing wall-clock time, `yyyy-MM-dd HH:mm:ss`.
 */
export function alipayTimestamp(now: number): string {
  return new Date(now + BEIJING_OFFSET_MS)
    .toISOString()
    .slice(0, 19)
    .replace('T', ' ');
}

/**
 * Content Alipay signs: non-empty parameters except `sign`, sorted by key,
 * joined as raw `key=value` pairs.
 */
export function alipaySigningContent(params: Record<string, string>): string {
  return Object.keys(params)
    .filter((key) => key !== 'sign' && params[key] !== '')
    .sort()
    .map((key) => `${key}=${params[key]}`)
    .join('&');
}

/**
 * SHA256withRSA over the signing content. `clientSecret` holds the
 * application's PEM private key.
 */
export function signAlipayParams(
  params: Record<string, string>,
  privateKey: string
): string {
  return createSign('RSA-SHA256')
    .update(alipaySigningContent(params), 'utf8')
    .sign(privateKey, 'base64');
}

function gatewayRequest(
  ctx: SourceContext,
  url: string,
  params: Record<string, string>
): HttpRequestDescriptor {
  const data: Record<string, string> = {
    app_id: ctx.config.clientId,
    charset: 'utf-8',
    sign_type: 'RSA2',
    timestamp: alipayTimestamp(ctx.now),
    version: '1.0',
    ...params,
  };
  data.sign = signAlipayParams(data, ctx.config.clientSecret);
  return { method: 'POST', url, body: { encoding: 'form', data } };
}

export const alipay = defineSource({
  name: 'alipay',
  endpoints: {
    authorize: 'https://openauth.alipay.com/oauth2/publicAppAuthorize.htm',
    token: 'https://openapi.alipay.com/gateway.do',
    profile: 'https://openapi.alipay.com/gateway.do',
    refresh: 'https://openapi.alipay.com/gateway.do',
  },
  defaultScopes: ['auth_user'],
  scopeDelimiter: ',',
  quirks: { signature: 'rsa2' },
  authorize: { params: { clientId: 'app_id', responseType: null } },
  token: {
    root: TOKEN_ROOT,
    fields: { uid: 'user_id', openId: 'open_id' },
  },
  profile: { root: PROFILE_ROOT },
  identity: {
    uuid: 'user_id',
    username: 'nick_name',
    nickname: 'nick_name',
    avatar: 'avatar',
    mobile: 'mobile',
    location: 'city',
    gender: 'gender',
  },
  errorCheck: combineErrorChecks(
    codeErrorCheck('error_response.code', 'error_response.sub_msg'),
    codeErrorCheck(`${TOKEN_ROOT}.code`, `${TOKEN_ROOT}.sub_msg`, ['10000']),
    codeErrorCheck(`${PROFILE_ROOT}.code`, `${PROFILE_ROOT}.sub_msg`, ['10000'])
  ),
  overrides: {
    tokenRequest: (ctx, input) =>
      gatewayRequest(ctx, ctx.endpoints.token, {
        method: 'alipay.system.oauth.token',
        grant_type: 'authorization_code',
        code: input.code,
      }),
    profileRequest: (ctx, token) =>
      gatewayRequest(ctx, ctx.endpoints.profile ?? ctx.endpoints.token, {
        method: 'alipay.user.info.share',
        auth_token: token.accessToken,
      }),
    refreshRequest: (ctx, refreshToken) =>
      gatewayRequest(ctx, ctx.endpoints.refresh ?? ctx.endpoints.token, {
        method: 'alipay.system.oauth.token',
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      }),
  },
});
