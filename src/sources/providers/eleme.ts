import {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from '../define.js';

export const eleme = defineSource({
  name: 'eleme',
  endpoints: {
    authorize: 'https://open-api.shop.ele.me/authorize',
    token: 'https://open-api.shop.ele.me/token',
    profile: 'https://open-api.shop.ele.me/api/v1/user',
    refresh: 'https://open-api.shop.ele.me/token',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  profile: { root: 'data' },
  identity: {
    uuid: 'userId',
    username: 'userName',
    nickname: 'shopName',
    avatar: 'shopLogo',
    email: 'email',
    mobile: 'mobile',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('status', 'message', ['success'])
  ),
});
