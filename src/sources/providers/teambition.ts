import { combineErrorChecks, defineSource, oauthErrorCheck } from '../define.js';
import type { ErrorCheck } from '../define.js';
import { asString } from '../../utils/guards.js';

/** Failures come back as `{ name, message }` with neither a token nor a user */
const teambitionMessage: ErrorCheck = (raw) => {
  const message = asString(raw.message);
  if (message === undefined || raw._id !== undefined || raw.access_token !== undefined) {
    return undefined;
  }
  return { error: asString(raw.name) ?? 'teambition_error', description: message };
};

/**
 * Teambition takes JSON bodies and the grant type `code`.
 */
export const teambition = defineSource({
  name: 'teambition',
  endpoints: {
    authorize: 'https://account.teambition.com/oauth2/authorize',
    token: 'https://account.teambition.com/oauth2/access_token',
    profile: 'https://api.teambition.com/users/me',
    refresh: 'https://account.teambition.com/oauth2/refresh_token',
  },
  defaultScopes: ['user'],
  scopeDelimiter: ',',
  token: { encoding: 'json', extra: { grant_type: 'code' } },
  identity: {
    uuid: '_id',
    username: 'name',
    nickname: 'name',
    avatar: 'avatarUrl',
    email: 'email',
    mobile: 'phone',
  },
  errorCheck: combineErrorChecks(oauthErrorCheck, teambitionMessage),
});
