import { createCipheriv, createHash } from 'node:crypto';
import { defineSource } from '../define.js';
import type { AuthConfig } from '../../types.js';
import { asString, isRecord } from '../../utils/guards.js';

const AES_KEY_BYTES = new Set([16, 24, 32]);

/**
 * AES-ECB with PKCS#7 padding, base64 encoded. The client secret is the key
 * and must be 16, 24 or 32 bytes. Empty text stays empty.
 */
export function zxxkEncrypt(text: string, key: string): string {
  if (!text) return '';
  const keyBytes = Buffer.from(key, 'utf8');
  if (!AES_KEY_BYTES.has(keyBytes.length)) {
    throw new Error('zxxk client secret must be 16, 24 or 32 bytes');
  }
  const cipher = createCipheriv(`aes-${keyBytes.length * 8}-ecb`, keyBytes, null);
  return Buffer.concat([cipher.update(text, 'utf8'), cipher.final()]).toString('base64');
}

/**
 * Parameter values sorted by key and concatenated, then the secret, MD5 in
 * upper-case hex.
 */
export function signZxxkParams(params: Record<string, string>, secret: string): string {
  const content = Object.keys(params)
    .sort()
    .map((key) => params[key])
    .join('');
  return createHash('md5')
    .update(`${content}${secret}`, 'utf8')
    .digest('hex')
    .toUpperCase();
}

/**
 * Login link into the configured `service` for a signed-in user, with
 * `service_args` and the user's `_openid` on the service URL. Undefined
 * when no service is configured.
 */
export function zxxkServiceUrl(
  config: AuthConfig,
  profileEndpoint: string,
  openId: string
): string | undefined {
  const service = asString(config.extras?.service);
  if (service === undefined) return undefined;

  const serviceArgs = new URLSearchParams();
  const configured = config.extras?.service_args;
  if (isRecord(configured)) {
    for (const [key, value] of Object.entries(configured)) {
      const text = asString(value);
      if (text !== undefined) serviceArgs.set(key, text);
    }
  }
  serviceArgs.set('_openid', openId);

  const login = new URL('/login', new URL(profileEndpoint).origin);
  login.searchParams.set('service', `${service}?${serviceArgs.toString()}`);
  return login.toString();
}

/**
 * Zxxk single sign-on. Authorize and token calls are signed; `open_id`,
 * `extra` and the timestamp travel AES-encrypted. `config.extras.service`
 * names the service to sign in to.
 */
export const zxxk = defineSource({
  name: 'zxxk',
  endpoints: {
    authorize: 'https://sso.zxxk.com/oauth2/authorize',
    token: 'https://sso.zxxk.com/oauth2/accessToken',
    profile: 'https://sso.zxxk.com/oauth2/profile',
  },
  token: { fields: { expiresIn: 'expires' } },
  profile: { auth: { query: 'access_token' } },
  identity: {
    uuid: 'open_id',
    username: 'open_id',
  },
  overrides: {
    authorizeUrl: (ctx, input) => {
      const { clientId, clientSecret, extras } = ctx.config;
      const service = asString(extras?.service);
      if (service === undefined) {
        throw new Error('zxxk requires config.extras.service');
      }
      const params: Record<string, string> = {
        client_id: clientId,
        open_id: zxxkEncrypt(asString(extras?.open_id) ?? '', clientSecret),
        service,
        redirect_uri: ctx.config.redirectUri ?? '',
        timespan: zxxkEncrypt(String(ctx.now), clientSecret),
        extra: zxxkEncrypt(asString(extras?.extra) ?? '', clientSecret),
      };
      params.signature = signZxxkParams(params, clientSecret);
      params.state = input.state;
      return { endpoint: ctx.endpoints.authorize, params };
    },
    tokenRequest: (ctx, input) => {
      const query: Record<string, string> = {
        client_id: ctx.config.clientId,
        code: input.code,
        redirect_uri: ctx.config.redirectUri ?? '',
      };
      query.signature = signZxxkParams(query, ctx.config.clientSecret);
      return { method: 'POST', url: ctx.endpoints.token, query };
    },
  },
});
