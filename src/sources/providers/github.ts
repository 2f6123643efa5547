import { defineSource } from '../define.js';

export const github = defineSource({
  name: 'github',
  endpoints: {
    authorize: 'https://github.com/login/oauth/authorize',
    token: 'https://github.com/login/oauth/access_token',
    profile: 'https://api.github.com/user',
  },
  defaultScopes: ['read:user', 'user:email'],
  token: { params: { grantType: null } },
  profile: {
    auth: 'token',
    headers: { 'User-Agent': 'unified-oauth-client' },
  },
  identity: {
    uuid: 'id',
    username: 'login',
    nickname: 'name',
    avatar: 'avatar_url',
    blog: 'blog',
    company: 'company',
    location: 'location',
    email: 'email',
    remark: 'bio',
  },
});
