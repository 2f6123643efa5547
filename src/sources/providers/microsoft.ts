import { defineSource } from '../define.js';

/**
 * Microsoft identity platform, `common` tenant. Single-tenant apps override
 * the authorize and token endpoints.
 */
export const microsoft = defineSource({
  name: 'microsoft',
  endpoints: {
    authorize: 'https://login.microsoftonline.com/common/oauth2/v2.0/authorize',
    token: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
    profile: 'https://graph.microsoft.com/v1.0/me',
    refresh: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
  },
  defaultScopes: ['openid', 'offline_access', 'User.Read'],
  authorize: { extra: { response_mode: 'query' } },
  identity: {
    uuid: 'id',
    username: 'userPrincipalName',
    nickname: 'displayName',
    email: 'mail',
    mobile: 'mobilePhone',
    location: 'officeLocation',
    remark: 'jobTitle',
  },
});
