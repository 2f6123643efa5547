import { codeErrorCheck, defineSource } from '../define.js';
import { mapIdentity } from '../mapping.js';
import type { IdentityFieldMap } from '../types.js';
import { asString, readPath } from '../../utils/guards.js';

const identity: IdentityFieldMap = {
  uuid: '@token.openId',
  username: 'name',
  nickname: 'nick',
  avatar: 'avatar',
  email: 'email',
};

/**
 * Tencent Cloud open login. Identified by the token's `open_id`, falling
 * back to the account id in the profile.
 */
export const tencentCloud = defineSource({
  name: 'tencent_cloud',
  endpoints: {
    authorize: 'https://cloud.tencent.com/open/authorize',
    token: 'https://cloud.tencent.com/open/access_token',
    profile: 'https://cloud.tencent.com/open/info',
  },
  defaultScopes: ['user'],
  scopeDelimiter: ',',
  token: { root: 'data', fields: { openId: 'open_id' } },
  profile: { root: 'data' },
  identity,
  errorCheck: codeErrorCheck('code', 'message'),
  overrides: {
    parseProfileResponse: (raw, token) => {
      const fields = mapIdentity(raw, identity, token, 'data');
      if (fields.uuid === undefined) {
        const id = asString(readPath(raw, 'data.id'));
        if (id !== undefined) fields.uuid = id;
      }
      return fields;
    },
  },
});
