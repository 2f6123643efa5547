import { codeErrorCheck, defineSource } from '../define.js';

export const douyin = defineSource({
  name: 'douyin',
  endpoints: {
    authorize: 'https://open.douyin.com/platform/oauth/connect',
    token: 'https://open.douyin.com/oauth/access_token/',
    profile: 'https://open.douyin.com/oauth/userinfo/',
    refresh: 'https://open.douyin.com/oauth/refresh_token/',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  authorize: { params: { clientId: 'client_key' } },
  token: {
    method: 'GET',
    params: { clientId: 'client_key', redirectUri: null },
    root: 'data',
    fields: { openId: 'open_id', unionId: 'union_id' },
  },
  profile: {
    auth: { query: 'access_token' },
    query: (_ctx, token) => ({ open_id: token.openId ?? '' }),
    root: 'data',
  },
  identity: {
    uuid: 'open_id',
    username: 'nickname',
    nickname: 'nickname',
    avatar: 'avatar',
    location: 'city',
    gender: 'gender',
  },
  errorCheck: codeErrorCheck('data.error_code', 'data.description'),
});
