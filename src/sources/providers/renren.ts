import { defineSource } from '../define.js';
import { mapIdentity } from '../mapping.js';
import type { IdentityFieldMap } from '../types.js';
import { asString, readPath } from '../../utils/guards.js';

const identity: IdentityFieldMap = {
  uuid: 'id',
  username: 'name',
  nickname: 'screen_name',
  avatar: 'avatar.large',
  email: 'email',
  gender: 'sex',
};

/**
 * Renren Graph API v2. `sex` is 1 for male and 0 for female.
 */
export const renren = defineSource({
  name: 'renren',
  endpoints: {
    authorize: 'https://graph.renren.com/oauth/authorize',
    token: 'https://graph.renren.com/oauth/token',
    profile: 'https://api.renren.com/v2/user/login/get',
  },
  defaultScopes: ['read_user_info'],
  scopeDelimiter: ',',
  profile: {
    auth: { query: 'access_token' },
    query: () => ({ format: 'json' }),
    root: 'response',
  },
  identity,
  overrides: {
    parseProfileResponse: (raw, token) => {
      const fields = mapIdentity(raw, identity, token, 'response');
      if (asString(readPath(raw, 'response.sex')) === '0') {
        fields.gender = 'female';
      }
      return fields;
    },
  },
});
