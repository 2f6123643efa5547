import { defineSource } from '../define.js';

/** Login with Amazon */
export const amazon = defineSource({
  name: 'amazon',
  endpoints: {
    authorize: 'https://www.amazon.com/ap/oa',
    token: 'https://api.amazon.com/auth/o2/token',
    profile: 'https://api.amazon.com/user/profile',
    refresh: 'https://api.amazon.com/auth/o2/token',
  },
  defaultScopes: ['profile'],
  identity: {
    uuid: 'user_id',
    username: 'name',
    nickname: 'name',
    email: 'email',
    location: 'postal_code',
  },
});
