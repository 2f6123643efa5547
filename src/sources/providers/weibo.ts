import { combineErrorChecks, codeErrorCheck, oauthErrorCheck, defineSource } from '../define.js';

export const weibo = defineSource({
  name: 'weibo',
  endpoints: {
    authorize: 'https://api.weibo.com/oauth2/authorize',
    token: 'https://api.weibo.com/oauth2/access_token',
    profile: 'https://api.weibo.com/2/users/show.json',
    revoke: 'https://api.weibo.com/oauth2/revokeoauth2',
  },
  defaultScopes: ['all'],
  scopeDelimiter: ',',
  token: { fields: { uid: 'uid' } },
  profile: {
    auth: { query: 'access_token' },
    query: (_ctx, token) => ({ uid: token.uid ?? '' }),
  },
  revoke: { tokenParam: 'access_token', includeClient: false },
  identity: {
    uuid: 'idstr',
    username: 'name',
    nickname: 'screen_name',
    avatar: 'profile_image_url',
    blog: 'url',
    location: 'location',
    remark: 'description',
    gender: 'gender',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('error_code', 'error')
  ),
});
