import { defineSource } from '../define.js';

export const line = defineSource({
  name: 'line',
  endpoints: {
    authorize: 'https://access.line.me/oauth2/v2.1/authorize',
    token: 'https://api.line.me/oauth2/v2.1/token',
    profile: 'https://api.line.me/v2/profile',
    refresh: 'https://api.line.me/oauth2/v2.1/token',
    revoke: 'https://api.line.me/oauth2/v2.1/revoke',
  },
  defaultScopes: ['profile', 'openid', 'email'],
  revoke: { tokenParam: 'access_token' },
  identity: {
    uuid: 'userId',
    username: 'displayName',
    nickname: 'displayName',
    avatar: 'pictureUrl',
    remark: 'statusMessage',
  },
});
