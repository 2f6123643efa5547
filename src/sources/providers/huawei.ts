import { codeErrorCheck, combineErrorChecks, defineSource, oauthErrorCheck } from '../define.js';

export const huawei = defineSource({
  name: 'huawei',
  endpoints: {
    authorize: 'https://oauth-login.cloud.huawei.com/oauth2/v3/authorize',
    token: 'https://oauth-login.cloud.huawei.com/oauth2/v3/token',
    profile: 'https://api.vmall.com/rest.php',
    refresh: 'https://oauth-login.cloud.huawei.com/oauth2/v3/token',
  },
  defaultScopes: ['https://www.huawei.com/auth/account/base.profile'],
  authorize: { extra: { access_type: 'offline' } },
  profile: {
    auth: { query: 'access_token' },
    query: (ctx) => ({
      nsp_fmt: 'JSON',
      nsp_svc: 'OpenUP.User.getInfo',
      nsp_ts: String(Math.floor(ctx.now / 1000)),
    }),
  },
  identity: {
    uuid: 'userID',
    username: 'userName',
    nickname: 'displayName',
    avatar: 'headPictureURL',
    email: 'email',
    mobile: 'mobileNumber',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('NSP_STATUS', 'error')
  ),
});
