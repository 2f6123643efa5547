export type {
  AuthorizeInput,
  AuthorizeTemplate,
  ExchangeInput,
  GrantType,
  IdentityField,
  IdentityFieldMap,
  IdentityFields,
  ProviderFailure,
  SourceContext,
  SourceDescriptor,
  SourceEndpoints,
  SourceQuirks,
  TokenAugmentation,
  TokenField,
  TokenFieldMap,
} from './types.js';
export {
  codeErrorCheck,
  combineErrorChecks,
  defineSource,
  oauthErrorCheck,
} from './define.js';
export type { ErrorCheck, ProfileAuthStyle, SourceDefinition } from './define.js';
export { mapIdentity, mapTokenResponse, normalizeGender } from './mapping.js';
export {
  percentEncode,
  signatureBaseString,
  signingKey,
  signOAuth1Request,
  verifyOAuth1Signature,
} from './oauth1.js';
export type { OAuth1Consumer, OAuth1SignOptions } from './oauth1.js';
export * from './providers/index.js';
