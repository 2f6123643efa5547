import { codeErrorCheck, combineErrorChecks, defineSource, oauthErrorCheck } from '../define.js';
import { asString } from '../../utils/guards.js';

/**
 * Stack Exchange, bound to stackoverflow.com. The API key comes from
 * `config.extras.key`.
 */
export const stackOverflow = defineSource({
  name: 'stack_overflow',
  endpoints: {
    authorize: 'https://stackoverflow.com/oauth',
    token: 'https://stackoverflow.com/oauth/access_token/json',
    profile: 'https://api.stackexchange.com/2.3/me',
  },
  defaultScopes: ['read_inbox'],
  scopeDelimiter: ',',
  authorize: { params: { responseType: null } },
  token: { params: { grantType: null }, fields: { expiresIn: 'expires' } },
  profile: {
    auth: { query: 'access_token' },
    query: (ctx) => {
      const query: Record<string, string> = { site: 'stackoverflow' };
      const key = asString(ctx.config.extras?.key);
      if (key !== undefined) query.key = key;
      return query;
    },
    root: 'items.0',
  },
  identity: {
    uuid: 'user_id',
    username: 'display_name',
    nickname: 'display_name',
    avatar: 'profile_image',
    blog: 'website_url',
    location: 'location',
    remark: 'about_me',
  },
  errorCheck: combineErrorChecks(
    oauthErrorCheck,
    codeErrorCheck('error_id', 'error_message')
  ),
});
