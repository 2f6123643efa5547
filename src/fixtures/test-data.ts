/**
 * Consolidated test fixtures
 * Simple, focused test data for all test files
 */

import type { AuthConfig } from '../types.js';

// ============================================================================
// CONFIG DATA
// ============================================================================

export const testConfigs = {
  minimal: {
    clientId: 'abc',
    clientSecret: 'test-secret',
    redirectUri: 'http://x/cb',
  },
  twitter: {
    clientId: 'test-consumer-key',
    clientSecret: 'test-consumer-secret',
    redirectUri: 'https://app.example.com/callback/twitter',
  },
  wechatMini: {
    clientId: 'test-mini-appid',
    clientSecret: 'test-mini-secret',
  },
} satisfies Record<string, AuthConfig>;

// ============================================================================
// PROVIDER PAYLOADS
// ============================================================================

export const githubPayloads = {
  token: {
    access_token: 'test-access-token',
    token_type: 'bearer',
    scope: 'read:user,user:email',
  },
  profile: {
    id: 1001,
    login: 'octo',
    name: 'Octo Cat',
    avatar_url: 'https://avatars.example.com/u/1001',
    blog: 'https://octo.example.com',
    company: 'Example Corp',
    location: 'Lisbon',
    email: 'octo@example.com',
    bio: 'Builds things',
    plan: { name: 'free' },
  },
};

export const twitterPayloads = {
  requestToken: {
    oauth_token: 'test-request-token',
    oauth_token_secret: 'test-request-secret',
    oauth_callback_confirmed: 'true',
  },
  accessToken: {
    oauth_token: 'test-user-token',
    oauth_token_secret: 'test-user-secret',
    user_id: '77',
    screen_name: 'birdie',
  },
  profile: {
    id_str: '77',
    screen_name: 'birdie',
    name: 'Birdie',
    profile_image_url_https: 'https://images.example.com/birdie.png',
    location: 'Porto',
  },
};

export const qqPayloads = {
  token: {
    access_token: 'test-qq-token',
    expires_in: '7776000',
    refresh_token: 'test-qq-refresh',
  },
  me: { client_id: 'abc', openid: 'test-openid', unionid: 'test-unionid' },
  profile: {
    ret: 0,
    msg: '',
    nickname: 'Penguin',
    figureurl_qq_2: 'https://q.example.com/100',
    gender: '男',
    city: 'Shenzhen',
  },
};

export const wechatMiniPayloads = {
  session: {
    openid: 'test-mini-openid',
    session_key: 'test-session-key',
    unionid: 'test-mini-unionid',
  },
};

// ============================================================================
// ERROR TEST DATA
// ============================================================================

export const errorData = {
  http400: {
    status: 400,
    statusText: 'Bad Request',
  },

  oauthError: {
    error: 'invalid_grant',
    error_description: 'Invalid authorization code',
    statusCode: 400,
  },

  networkTimeout: new Error('Network timeout'),
};

// ============================================================================
// MODULE TEST DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'OAuthClient',
    'AuthRequest',
    'SourceRegistry',
    'buildAuthRequest',
    'MemoryCacheStore',
    'RedisCacheStore',
    'FetchTransport',
    'AuthError',
    'ErrorNormalizer',
    'DefaultLogger',
    'defineSource',
    'fromEnvironment',
    'BUILTIN_SOURCES',
  ],
};
