import { defineSource } from '../define.js';

/**
 * Sign In with LinkedIn using OpenID Connect.
 */
export const linkedin = defineSource({
  name: 'linkedin',
  endpoints: {
    authorize: 'https://www.linkedin.com/oauth/v2/authorization',
    token: 'https://www.linkedin.com/oauth/v2/accessToken',
    profile: 'https://api.linkedin.com/v2/userinfo',
    refresh: 'https://www.linkedin.com/oauth/v2/accessToken',
  },
  defaultScopes: ['openid', 'profile', 'email'],
  identity: {
    uuid: 'sub',
    username: 'email',
    nickname: 'name',
    avatar: 'picture',
    email: 'email',
    location: 'locale.country',
  },
});
