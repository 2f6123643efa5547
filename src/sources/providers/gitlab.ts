import { defineSource } from '../define.js';

/**
 * gitlab.com; self-hosted instances override the endpoints in their config.
 */
export const gitlab = defineSource({
  name: 'gitlab',
  endpoints: {
    authorize: 'https://gitlab.com/oauth/authorize',
    token: 'https://gitlab.com/oauth/token',
    profile: 'https://gitlab.com/api/v4/user',
    refresh: 'https://gitlab.com/oauth/token',
    revoke: 'https://gitlab.com/oauth/revoke',
  },
  defaultScopes: ['read_user'],
  identity: {
    uuid: 'id',
    username: 'username',
    nickname: 'name',
    avatar: 'avatar_url',
    blog: 'web_url',
    company: 'organization',
    location: 'location',
    email: 'email',
    remark: 'bio',
  },
});
