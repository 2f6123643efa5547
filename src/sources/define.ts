import type { TokenResponse } from '../types.js';
import type {
  BodyEncoding,
  HttpMethod,
  HttpRequestDescriptor,
  ResponseFormat,
} from '../http/types.js';
import type {
  AuthorizeInput,
  AuthorizeTemplate,
  ExchangeInput,
  GrantType,
  IdentityFieldMap,
  IdentityFields,
  ProviderFailure,
  SourceContext,
  SourceDescriptor,
  SourceEndpoints,
  SourceQuirks,
  TokenFieldMap,
} from './types.js';
import { mapIdentity, mapTokenResponse } from './mapping.js';
import { asString, isRecord, readPath } from '../utils/guards.js';
import { deepFreeze } from '../utils/freeze.js';

/** A parameter name, or null to leave the parameter out */
type ParamName = string | null;

export type ProfileAuthStyle =
  | 'bearer'
  | 'token'
  | 'oauth1'
  | 'none'
  | { query: string };

export type ErrorCheck = (
  raw: Record<string, unknown>
) => ProviderFailure | undefined;

type SourceFunctions = Pick<
  SourceDescriptor,
  | 'authorizeUrl'
  | 'tokenRequest'
  | 'parseTokenResponse'
  | 'profileRequest'
  | 'parseProfileResponse'
  | 'requestTokenRequest'
  | 'augmentToken'
  | 'refreshRequest'
  | 'revokeRequest'
>;

/**
 * Data-first description of a provider. Anything the tables cannot express
 * goes in `overrides`.
 */
export interface SourceDefinition {
  name: string;
  grant?: GrantType;
  endpoints: SourceEndpoints;
  defaultScopes?: string[];
  scopeDelimiter?: string;
  quirks?: SourceQuirks;
  authorize?: {
    params?: Partial<
      Record<
        'clientId' | 'redirectUri' | 'responseType' | 'scope' | 'state',
        ParamName
      >
    >;
    extra?: Record<string, string>;
    fragment?: string;
  };
  token?: {
    method?: HttpMethod;
    encoding?: BodyEncoding;
    params?: Partial<
      Record<
        'clientId' | 'clientSecret' | 'code' | 'redirectUri' | 'grantType',
        ParamName
      >
    >;
    extra?: Record<string, string>;
    headers?: Record<string, string>;
    responseFormat?: ResponseFormat;
    root?: string;
    fields?: Partial<TokenFieldMap>;
  };
  profile?: {
    auth?: ProfileAuthStyle;
    method?: HttpMethod;
    query?: (ctx: SourceContext, token: TokenResponse) => Record<string, string>;
    headers?: Record<string, string>;
    responseFormat?: ResponseFormat;
    root?: string;
  };
  /** Token revocation; only used when `endpoints.revoke` is set */
  revoke?: {
    method?: HttpMethod;
    /** Parameter carrying the access token, `token` by default */
    tokenParam?: string;
    /** Send client_id and client_secret along, true by default */
    includeClient?: boolean;
  };
  identity: IdentityFieldMap;
  errorCheck?: ErrorCheck;
  overrides?: Partial<SourceFunctions>;
}

const OAUTH2_TOKEN_FIELDS: TokenFieldMap = {
  accessToken: 'access_token',
  refreshToken: 'refresh_token',
  expiresIn: 'expires_in',
  tokenType: 'token_type',
  scope: 'scope',
  idToken: 'id_token',
};

const OAUTH1_TOKEN_FIELDS: TokenFieldMap = {
  accessToken: 'oauth_token',
  tokenSecret: 'oauth_token_secret',
  uid: 'user_id',
};

/**
 * Standard OAuth error body: `{ error, error_description }`, or Graph-style
 * `{ error: { message, type } }`.
 */
export const oauthErrorCheck: ErrorCheck = (raw) => {
  const error = raw.error;
  if (isRecord(error)) {
    return {
      error: asString(error.type) ?? asString(error.code) ?? 'provider_error',
      description: asString(error.message),
    };
  }
  const code = asString(error);
  if (code === undefined) return undefined;
  return { error: code, description: asString(raw.error_description) };
};

/**
 * Providers that report failure through a status code field, e.g. WeChat's
 * `errcode`/`errmsg` or Feishu's `code`/`msg`.
 */
export function codeErrorCheck(
  codePath: string,
  messagePath: string,
  success: ReadonlyArray<string> = ['0']
): ErrorCheck {
  return (raw) => {
    const code = asString(readPath(raw, codePath));
    if (code === undefined || success.includes(code)) return undefined;
    return {
      error: code,
      description: asString(readPath(raw, messagePath)),
    };
  };
}

export function combineErrorChecks(...checks: ErrorCheck[]): ErrorCheck {
  return (raw) => {
    for (const check of checks) {
      const failure = check(raw);
      if (failure) return failure;
    }
    return undefined;
  };
}

function setParam(
  params: Record<string, string>,
  name: ParamName | undefined,
  fallback: string,
  value: string | undefined
): void {
  const key = name === undefined ? fallback : name;
  if (key !== null && value !== undefined && value !== '') {
    params[key] = value;
  }
}

/**
 * Build a frozen SourceDescriptor from a definition.
 */
export function defineSource(definition: SourceDefinition): SourceDescriptor {
  const grant = definition.grant ?? 'authorization_code';
  const tokenOptions = definition.token ?? {};
  const profileOptions = definition.profile ?? {};
  const tokenFields: TokenFieldMap = {
    ...(grant === 'oauth1a' ? OAUTH1_TOKEN_FIELDS : OAUTH2_TOKEN_FIELDS),
    ...tokenOptions.fields,
  };
  const tokenMethod = tokenOptions.method ?? 'POST';
  const tokenFormat =
    tokenOptions.responseFormat ?? (grant === 'oauth1a' ? 'form' : 'json');
  const profileAuth =
    profileOptions.auth ?? (grant === 'oauth1a' ? 'oauth1' : 'bearer');

  const tokenCall = (
    url: string,
    params: Record<string, string>
  ): HttpRequestDescriptor => {
    const request: HttpRequestDescriptor = {
      method: tokenMethod,
      url,
      responseFormat: tokenFormat,
    };
    if (tokenOptions.headers) request.headers = { ...tokenOptions.headers };
    if (tokenMethod === 'GET') {
      request.query = params;
    } else {
      request.body = { encoding: tokenOptions.encoding ?? 'form', data: params };
    }
    return request;
  };

  const authorizeUrl = (
    ctx: SourceContext,
    input: AuthorizeInput
  ): AuthorizeTemplate => {
    const params: Record<string, string> = {};
    if (grant === 'oauth1a') {
      setParam(params, undefined, 'oauth_token', input.oauthToken);
    } else {
      const names = definition.authorize?.params ?? {};
      setParam(params, names.clientId, 'client_id', ctx.config.clientId);
      setParam(params, names.redirectUri, 'redirect_uri', ctx.config.redirectUri);
      setParam(params, names.responseType, 'response_type', 'code');
      setParam(params, names.scope, 'scope', ctx.scope);
      setParam(params, names.state, 'state', input.state);
    }
    Object.assign(params, definition.authorize?.extra);

    const template: AuthorizeTemplate = {
      endpoint: ctx.endpoints.authorize,
      params,
    };
    if (definition.authorize?.fragment) {
      template.fragment = definition.authorize.fragment;
    }
    return template;
  };

  const tokenRequest = (
    ctx: SourceContext,
    input: ExchangeInput
  ): HttpRequestDescriptor => {
    if (grant === 'oauth1a') {
      const request: HttpRequestDescriptor = {
        method: 'POST',
        url: ctx.endpoints.token,
        responseFormat: tokenFormat,
        oauth1: { params: { oauth_verifier: input.code } },
      };
      if (input.oauthToken) {
        request.oauth1 = { ...request.oauth1, token: input.oauthToken };
      }
      if (input.oauthTokenSecret) {
        request.oauth1 = { ...request.oauth1, tokenSecret: input.oauthTokenSecret };
      }
      return request;
    }

    const names = tokenOptions.params ?? {};
    const params: Record<string, string> = {};
    setParam(params, names.grantType, 'grant_type', 'authorization_code');
    setParam(params, names.code, 'code', input.code);
    setParam(params, names.clientId, 'client_id', ctx.config.clientId);
    setParam(params, names.clientSecret, 'client_secret', ctx.config.clientSecret);
    setParam(params, names.redirectUri, 'redirect_uri', ctx.config.redirectUri);
    Object.assign(params, tokenOptions.extra);
    return tokenCall(ctx.endpoints.token, params);
  };

  const parseTokenResponse = (raw: Record<string, unknown>): TokenResponse =>
    mapTokenResponse(raw, tokenFields, tokenOptions.root);

  const profileRequest = (
    ctx: SourceContext,
    token: TokenResponse
  ): HttpRequestDescriptor => {
    const url = ctx.endpoints.profile ?? '';
    const request: HttpRequestDescriptor = {
      method: profileOptions.method ?? 'GET',
      url,
      responseFormat: profileOptions.responseFormat ?? 'json',
      query: profileOptions.query?.(ctx, token) ?? {},
      headers: { ...profileOptions.headers },
    };
    if (profileAuth === 'bearer') {
      request.headers = {
        ...request.headers,
        Authorization: `Bearer ${token.accessToken}`,
      };
    } else if (profileAuth === 'token') {
      request.headers = {
        ...request.headers,
        Authorization: `token ${token.accessToken}`,
      };
    } else if (profileAuth === 'oauth1') {
      request.oauth1 = { token: token.accessToken };
      if (token.tokenSecret) request.oauth1.tokenSecret = token.tokenSecret;
    } else if (profileAuth !== 'none') {
      request.query = { ...request.query, [profileAuth.query]: token.accessToken };
    }
    return request;
  };

  const parseProfileResponse = (
    raw: Record<string, unknown>,
    token: TokenResponse
  ): IdentityFields =>
    mapIdentity(raw, definition.identity, token, profileOptions.root);

  const requestTokenRequest = (
    ctx: SourceContext,
    callbackUrl: string
  ): HttpRequestDescriptor => ({
    method: 'POST',
    url: ctx.endpoints.requestToken ?? '',
    responseFormat: 'form',
    oauth1: { params: { oauth_callback: callbackUrl } },
  });

  const refreshRequest = (
    ctx: SourceContext,
    refreshToken: string
  ): HttpRequestDescriptor => {
    const names = tokenOptions.params ?? {};
    const params: Record<string, string> = {};
    setParam(params, names.grantType, 'grant_type', 'refresh_token');
    params.refresh_token = refreshToken;
    setParam(params, names.clientId, 'client_id', ctx.config.clientId);
    setParam(params, names.clientSecret, 'client_secret', ctx.config.clientSecret);
    return tokenCall(ctx.endpoints.refresh ?? ctx.endpoints.token, params);
  };

  const revokeRequest = (
    ctx: SourceContext,
    token: TokenResponse
  ): HttpRequestDescriptor => {
    const options = definition.revoke ?? {};
    const params: Record<string, string> = {
      [options.tokenParam ?? 'token']: token.accessToken,
    };
    if (options.includeClient ?? true) {
      const names = tokenOptions.params ?? {};
      setParam(params, names.clientId, 'client_id', ctx.config.clientId);
      setParam(params, names.clientSecret, 'client_secret', ctx.config.clientSecret);
    }
    const url = ctx.endpoints.revoke ?? '';
    return (options.method ?? 'POST') === 'GET'
      ? { method: 'GET', url, query: params }
      : { method: 'POST', url, body: { encoding: 'form', data: params } };
  };

  const functions: SourceFunctions = {
    authorizeUrl,
    tokenRequest,
    parseTokenResponse,
    parseProfileResponse,
  };
  if (definition.endpoints.profile && !definition.quirks?.identityInTokenResponse) {
    functions.profileRequest = profileRequest;
  }
  if (grant === 'oauth1a') {
    functions.requestTokenRequest = requestTokenRequest;
  }
  if (definition.endpoints.refresh) {
    functions.refreshRequest = refreshRequest;
  }
  if (definition.endpoints.revoke) {
    functions.revokeRequest = revokeRequest;
  }
  Object.assign(functions, definition.overrides);

  const descriptor: SourceDescriptor = {
    name: definition.name,
    grant,
    endpoints: { ...definition.endpoints },
    defaultScopes: [...(definition.defaultScopes ?? [])],
    scopeDelimiter: definition.scopeDelimiter ?? ' ',
    quirks: { ...definition.quirks },
    tokenFields,
    identityFields: { ...definition.identity },
    detectError: definition.errorCheck ?? oauthErrorCheck,
    ...functions,
    ...(profileOptions.root ? { profileRoot: profileOptions.root } : {}),
  };
  return deepFreeze(descriptor);
}
