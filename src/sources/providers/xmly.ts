import { codeErrorCheck, combineErrorChecks, defineSource, oauthErrorCheck } from '../define.js';

/**
 * Ximalaya. Tokens are nested under `access_token` and every answer carries
 * a `ret` status.
 */
export const xmly = defineSource({
  name: 'xmly',
  endpoints: {
    authorize: 'https://api.ximalaya.com/oauth2/js/authorize',
    token: 'https://api.ximalaya.com/oauth2/v2/access_token',
    profile: 'https://api.ximalaya.com/profile/user_info',
    refresh: 'https://api.ximalaya.com/oauth2/v2/refresh_token',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  token: {
    root: 'access_token',
    fields: { accessToken: 'token', refreshToken: 'refresh_token', expiresIn: 'expires_in' },
  },
  profile: {
    query: (ctx) => ({
      app_key: ctx.config.clientId,
      client_os_type: '3',
      device_id: 'web',
    }),
    root: 'data',
  },
  identity: {
    uuid: 'id',
    username: 'nickname',
    nickname: 'nickname',
    avatar: 'avatar_url',
    gender: 'gender',
  },
  errorCheck: combineErrorChecks(oauthErrorCheck, codeErrorCheck('ret', 'msg')),
});
