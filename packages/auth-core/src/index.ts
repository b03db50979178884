export type {
  AccessTokenClaims,
  Identity,
  IdentityId,
  IdentityProjection,
  IdentityProvider,
  OAuthCallbackErrorCode,
  OAuthProvider,
  PermissionSet,
  ProviderProfile,
  RefreshCredentialId,
  RefreshCredentialRecord,
  Timestamp,
  TokenEnvelope,
  TokenType
} from "./types";
export { OAUTH_PROVIDERS, isOAuthProvider, toIdentityProjection } from "./types";

export { HandshakeStateCodec } from "./handshakeState";
export type { HandshakeState, HandshakeStateCodecOptions } from "./handshakeState";
