import { codeErrorCheck, defineSource } from '../define.js';
import { mapIdentity } from '../mapping.js';
import type { IdentityFieldMap } from '../types.js';
import { asString, readPath } from '../../utils/guards.js';

const identity: IdentityFieldMap = {
  uuid: '@token.uid',
  username: 'username',
  nickname: 'name',
  avatar: 'avatar',
  email: 'email',
  mobile: 'phone',
};

/**
 * Kujiale wraps every answer in `{ code, msg, data }`. The user id comes
 * from the token response, or from the profile when the token lacks one.
 */
export const kujiale = defineSource({
  name: 'kujiale',
  endpoints: {
    authorize: 'https://oauth.kujiale.com/oauth2/show',
    token: 'https://oauth.kujiale.com/oauth2/auth/token',
    profile: 'https://oauth.kujiale.com/oauth2/openapi/user',
    refresh: 'https://oauth.kujiale.com/oauth2/auth/token/refresh',
  },
  defaultScopes: ['user_info'],
  scopeDelimiter: ',',
  token: { root: 'data', fields: { uid: 'uid', openId: 'openid' } },
  profile: { root: 'data' },
  identity,
  errorCheck: codeErrorCheck('code', 'msg'),
  overrides: {
    parseProfileResponse: (raw, token) => {
      const fields = mapIdentity(raw, identity, token, 'data');
      if (fields.uuid === undefined) {
        const uid = asString(readPath(raw, 'data.uid'));
        if (uid !== undefined) fields.uuid = uid;
      }
      return fields;
    },
  },
});
