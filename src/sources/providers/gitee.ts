import { defineSource } from '../define.js';

export const gitee = defineSource({
  name: 'gitee',
  endpoints: {
    authorize: 'https://gitee.com/oauth/authorize',
    token: 'https://gitee.com/oauth/token',
    profile: 'https://gitee.com/api/v5/user',
    refresh: 'https://gitee.com/oauth/token',
  },
  defaultScopes: ['user_info'],
  profile: { auth: { query: 'access_token' } },
  identity: {
    uuid: 'id',
    username: 'login',
    nickname: 'name',
    avatar: 'avatar_url',
    blog: 'blog',
    company: 'company',
    location: 'address',
    email: 'email',
    remark: 'bio',
  },
});
