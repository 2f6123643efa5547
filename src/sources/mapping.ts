import type { AuthGender, TokenResponse } from '../types.js';
import type {
  IdentityField,
  IdentityFieldMap,
  IdentityFields,
  TokenField,
  TokenFieldMap,
} from './types.js';
import { asNumber, asString, isRecord, readPath } from '../utils/guards.js';

const TOKEN_PATH_PREFIX = '@token.';

const TOKEN_FIELDS: readonly TokenField[] = [
  'accessToken',
  'refreshToken',
  'expiresIn',
  'tokenType',
  'scope',
  'idToken',
  'openId',
  'unionId',
  'uid',
  'tokenSecret',
];

const IDENTITY_FIELDS: readonly IdentityField[] = [
  'uuid',
  'username',
  'nickname',
  'avatar',
  'email',
  'mobile',
  'blog',
  'company',
  'location',
  'remark',
  'gender',
];

const MALE_VALUES = new Set(['1', 'm', 'male', '男']);
const FEMALE_VALUES = new Set(['2', 'f', 'female', '女']);

export function normalizeGender(value: unknown): AuthGender {
  const text = asString(value)?.trim().toLowerCase();
  if (text === undefined) return 'unknown';
  if (MALE_VALUES.has(text)) return 'male';
  if (FEMALE_VALUES.has(text)) return 'female';
  return 'unknown';
}

/**
 * Select the record a mapping applies to: the payload itself, or the object
 * under `root` for providers that wrap their answer (`data`, `user`, ...).
 */
export function selectRoot(
  raw: Record<string, unknown>,
  root?: string
): Record<string, unknown> {
  if (!root) return raw;
  const nested = readPath(raw, root);
  return isRecord(nested) ? nested : {};
}

/**
 * Build a TokenResponse from a decoded token payload. Fields no path maps
 * are kept in `extras`. A missing access token yields an empty string for
 * the caller to reject.
 */
export function mapTokenResponse(
  raw: Record<string, unknown>,
  fields: TokenFieldMap,
  root?: string
): TokenResponse {
  const payload = selectRoot(raw, root);
  const token: TokenResponse = {
    accessToken: asString(readPath(payload, fields.accessToken)) ?? '',
  };

  const mappedKeys = new Set<string>();
  for (const field of TOKEN_FIELDS) {
    const path = fields[field];
    if (path === undefined) continue;
    mappedKeys.add(path);
    if (field !== 'accessToken') {
      assignTokenField(token, field, readPath(payload, path));
    }
  }

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!mappedKeys.has(key)) {
      extras[key] = value;
    }
  }
  if (Object.keys(extras).length > 0) {
    token.extras = extras;
  }

  return token;
}

function assignTokenField(
  token: TokenResponse,
  field: Exclude<TokenField, 'accessToken'>,
  value: unknown
): void {
  if (field === 'expiresIn') {
    const seconds = asNumber(value);
    if (seconds !== undefined) token.expiresIn = seconds;
    return;
  }
  const text = asString(value);
  if (text !== undefined) {
    token[field] = text;
  }
}

/**
 * Map a profile payload onto identity fields using a source's field table.
 */
export function mapIdentity(
  raw: Record<string, unknown>,
  fields: IdentityFieldMap,
  token: TokenResponse,
  root?: string
): IdentityFields {
  const payload = selectRoot(raw, root);
  const identity: IdentityFields = {};

  for (const field of IDENTITY_FIELDS) {
    const path = fields[field];
    if (path === undefined) continue;

    const value = path.startsWith(TOKEN_PATH_PREFIX)
      ? readPath(token, path.slice(TOKEN_PATH_PREFIX.length))
      : readPath(payload, path);

    if (field === 'gender') {
      identity.gender = normalizeGender(value);
    } else {
      const text = asString(value);
      if (text !== undefined) {
        identity[field] = text;
      }
    }
  }

  return identity;
}
