import { codeErrorCheck, combineErrorChecks, defineSource, oauthErrorCheck } from '../define.js';

/**
 * coding.net. Team workspaces override the endpoints with
 * `https://<team>.coding.net/...`.
 */
export const coding = defineSource({
  name: 'coding',
  endpoints: {
    authorize: 'https://coding.net/oauth_authorize.html',
    token: 'https://coding.net/api/oauth/access_token',
    profile: 'https://coding.net/api/account/current_user',
  },
  defaultScopes: ['user'],
  scopeDelimiter: ',',
  token: { method: 'GET', params: { redirectUri: null } },
  profile: { auth: 'token', root: 'data' },
  identity: {
    uuid: 'id',
    username: 'global_key',
    nickname: 'name',
    avatar: 'avatar',
    company: 'company',
    location: 'location',
    email: 'email',
    remark: 'slogan',
  },
  errorCheck: combineErrorChecks(oauthErrorCheck, codeErrorCheck('code', 'msg')),
});
