import { defineSource } from '../define.js';

export const oschina = defineSource({
  name: 'oschina',
  endpoints: {
    authorize: 'https://www.oschina.net/action/oauth2/authorize',
    token: 'https://www.oschina.net/action/openapi/token',
    profile: 'https://www.oschina.net/action/openapi/user',
  },
  token: { extra: { dataType: 'json' } },
  profile: {
    auth: { query: 'access_token' },
    query: () => ({ dataType: 'json' }),
  },
  identity: {
    uuid: 'id',
    username: 'name',
    nickname: 'name',
    avatar: 'avatar',
    blog: 'url',
    location: 'location',
    email: 'email',
    gender: 'gender',
  },
});
