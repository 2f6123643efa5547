import { defineSource } from '../define.js';

export const pinterest = defineSource({
  name: 'pinterest',
  endpoints: {
    authorize: 'https://www.pinterest.com/oauth/',
    token: 'https://api.pinterest.com/v5/oauth/token',
    profile: 'https://api.pinterest.com/v5/user_account',
    refresh: 'https://api.pinterest.com/v5/oauth/token',
  },
  defaultScopes: ['user_accounts:read'],
  scopeDelimiter: ',',
  identity: {
    uuid: 'id',
    username: 'username',
    nickname: 'business_name',
    avatar: 'profile_image',
    blog: 'website_url',
    remark: 'about',
  },
});
