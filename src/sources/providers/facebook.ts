import { defineSource } from '../define.js';

export const facebook = defineSource({
  name: 'facebook',
  endpoints: {
    authorize: 'https://www.facebook.com/v18.0/dialog/oauth',
    token: 'https://graph.facebook.com/v18.0/oauth/access_token',
    profile: 'https://graph.facebook.com/v18.0/me',
  },
  defaultScopes: ['public_profile', 'email'],
  scopeDelimiter: ',',
  token: { method: 'GET', params: { grantType: null } },
  profile: {
    auth: { query: 'access_token' },
    query: () => ({
      fields: 'id,name,email,gender,hometown,picture.width(400)',
    }),
  },
  identity: {
    uuid: 'id',
    username: 'name',
    nickname: 'name',
    avatar: 'picture.data.url',
    email: 'email',
    location: 'hometown.name',
    gender: 'gender',
  },
});
