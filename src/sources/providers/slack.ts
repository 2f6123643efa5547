import { defineSource } from '../define.js';

/**
 * Sign in with Slack (OAuth v2). Slack answers with HTTP 200 and
 * `{ ok: false, error }` on failure, which the default error check catches.
 */
export const slack = defineSource({
  name: 'slack',
  endpoints: {
    authorize: 'https://slack.com/oauth/v2/authorize',
    token: 'https://slack.com/api/oauth.v2.access',
    profile: 'https://slack.com/api/users.info',
    revoke: 'https://slack.com/api/auth.revoke',
  },
  defaultScopes: ['users:read', 'users:read.email'],
  scopeDelimiter: ',',
  token: { fields: { uid: 'authed_user.id' } },
  profile: { query: (_ctx, token) => ({ user: token.uid ?? '' }) },
  revoke: { method: 'GET', includeClient: false },
  identity: {
    uuid: 'user.id',
    username: 'user.name',
    nickname: 'user.profile.display_name',
    avatar: 'user.profile.image_192',
    email: 'user.profile.email',
    mobile: 'user.profile.phone',
    location: 'user.tz',
    remark: 'user.profile.title',
  },
});
