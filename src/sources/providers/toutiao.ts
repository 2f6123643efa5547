import { codeErrorCheck, defineSource } from '../define.js';

export const toutiao = defineSource({
  name: 'toutiao',
  endpoints: {
    authorize: 'https://open.snssdk.com/auth/authorize',
    token: 'https://open.snssdk.com/auth/token',
    profile: 'https://open.snssdk.com/data/user_profile',
  },
  defaultScopes: ['user_info'],
  authorize: {
    params: { clientId: 'client_key' },
    extra: { auth_only: '1', display: '0' },
  },
  token: {
    method: 'GET',
    params: { clientId: 'client_key', redirectUri: null },
    root: 'data',
    fields: { openId: 'open_id', uid: 'uid' },
  },
  profile: { auth: { query: 'access_token' }, root: 'data' },
  identity: {
    uuid: 'uid',
    username: 'screen_name',
    nickname: 'screen_name',
    avatar: 'avatar_url',
    remark: 'description',
    gender: 'gender',
  },
  errorCheck: codeErrorCheck('error_code', 'description'),
});
