import { combineErrorChecks, codeErrorCheck, oauthErrorCheck, defineSource } from '../define.js';

export const baidu = defineSource({
  name: 'baidu',
  endpoints: {
    authorize: 'https://openapi.baidu.com/oauth/2.0/authorize',
    token: 'https://openapi.baidu.com/oauth/2.0/token',
    profile: 'https://openapi.baidu.com/rest/2.0/passport/users/getInfo',
    refresh: 'https://openapi.baidu.com/oauth/2.0/token',
    revoke: 'https://openapi.baidu.com/rest/2.0/passport/auth/revokeAuthorization',
  },
  defaultScopes: ['basic'],
  authorize: { extra: { display: 'popup' } },
  profile: { auth: { query: 'access_token' } },
  revoke: { method: 'GET', tokenParam: 'access_token', includeClient: false },
  identity: {
    uuid: 'userid',
    username: 'username',
    nickname: 'username',
    avatar: 'portrait',
    location: 'location',
    remark: 'userdetail',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('error_code', 'error_msg')
  ),
});
