import { defineSource } from '../define.js';
import { asString, isRecord, readPath } from '../../utils/guards.js';

/**
 * Twitter (X) sign-in over OAuth 1.0a.
 */
export const twitter = defineSource({
  name: 'twitter',
  grant: 'oauth1a',
  endpoints: {
    requestToken: 'https://api.twitter.com/oauth/request_token',
    authorize: 'https://api.twitter.com/oauth/authenticate',
    token: 'https://api.twitter.com/oauth/access_token',
    profile: 'https://api.twitter.com/1.1/account/verify_credentials.json',
  },
  profile: { query: () => ({ include_email: 'true' }) },
  identity: {
    uuid: 'id_str',
    username: 'screen_name',
    nickname: 'name',
    avatar: 'profile_image_url_https',
    blog: 'url',
    location: 'location',
    email: 'email',
    remark: 'description',
  },
  errorCheck: (raw) => {
    const first = readPath(raw, 'errors.0');
    if (!isRecord(first)) return undefined;
    return {
      error: asString(first.code) ?? 'twitter_error',
      description: asString(first.message),
    };
  },
});
