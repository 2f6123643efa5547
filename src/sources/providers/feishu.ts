import { codeErrorCheck, defineSource } from '../define.js';

export const feishu = defineSource({
  name: 'feishu',
  endpoints: {
    authorize: 'https://open.feishu.cn/open-apis/authen/v1/index',
    token: 'https://open.feishu.cn/open-apis/authen/v1/access_token',
    profile: 'https://open.feishu.cn/open-apis/authen/v1/user_info',
    refresh: 'https://open.feishu.cn/open-apis/authen/v1/refresh_access_token',
  },
  authorize: {
    params: { clientId: 'app_id', responseType: null, scope: null },
  },
  token: {
    encoding: 'json',
    params: { clientId: 'app_id', clientSecret: 'app_secret', redirectUri: null },
    root: 'data',
    fields: { openId: 'open_id', unionId: 'union_id' },
  },
  profile: { root: 'data' },
  identity: {
    uuid: 'open_id',
    username: 'name',
    nickname: 'name',
    avatar: 'avatar_url',
    email: 'email',
    mobile: 'mobile',
  },
  errorCheck: codeErrorCheck('code', 'msg'),
});
