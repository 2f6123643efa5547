import { defineSource } from '../define.js';

/**
 * Taobao. The token response names the user, so there is no profile call.
 */
export const taobao = defineSource({
  name: 'taobao',
  endpoints: {
    authorize: 'https://oauth.taobao.com/authorize',
    token: 'https://oauth.taobao.com/token',
    refresh: 'https://oauth.taobao.com/token',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  quirks: { identityInTokenResponse: true },
  authorize: { params: { scope: null }, extra: { view: 'web' } },
  token: {
    extra: { view: 'web' },
    fields: { openId: 'taobao_user_id', unionId: 'taobao_open_uid' },
  },
  identity: {
    uuid: 'taobao_user_id',
    username: 'taobao_user_nick',
    nickname: 'taobao_user_nick',
  },
});
