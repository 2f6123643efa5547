import { defineSource } from '../define.js';

export const google = defineSource({
  name: 'google',
  endpoints: {
    authorize: 'https://accounts.google.com/o/oauth2/v2/auth',
    token: 'https://oauth2.googleapis.com/token',
    profile: 'https://openidconnect.googleapis.com/v1/userinfo',
    refresh: 'https://oauth2.googleapis.com/token',
    revoke: 'https://oauth2.googleapis.com/revoke',
  },
  defaultScopes: ['openid', 'email', 'profile'],
  authorize: { extra: { access_type: 'offline' } },
  revoke: { includeClient: false },
  identity: {
    uuid: 'sub',
    username: 'email',
    nickname: 'name',
    avatar: 'picture',
    email: 'email',
    location: 'locale',
  },
});
